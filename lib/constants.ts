/**
 * Header flags (FLG byte).
 */
export const flags = {
  /** The payload is probably ASCII text. Informational only, nothing to read. */
  FTEXT: 1 << 0,
  /** A CRC16 of the header follows the optional fields */
  FHCRC: 1 << 1,
  /** An XLEN-prefixed list of extra subfields follows the fixed header */
  FEXTRA: 1 << 2,
  /** A null-terminated original file name is present */
  FNAME: 1 << 3,
  /** A null-terminated comment is present */
  FCOMMENT: 1 << 4,
  RESERVED_BIT_5: 1 << 5,
  RESERVED_BIT_6: 1 << 6,
  RESERVED_BIT_7: 1 << 7,
} as const;

export const magic = [0x1f, 0x8b] as const;

export enum ECompression{
  //0-7 reserved
  DEFLATE = 8,
}

export enum EOperatingSystem{
  FAT = 0,
  AMIGA = 1,
  VMS = 2,
  UNIX = 3,
  VM_CMS = 4,
  ATARI_TOS = 5,
  HPFS = 6,
  MACINTOSH = 7,
  Z_SYSTEM = 8,
  CP_M = 9,
  TOPS_20 = 10,
  NTFS = 11,
  QDOS = 12,
  ACORN_RISCOS = 13,
  UNKNOWN = 255,
}

/** ID1, ID2, CM, FLG, MTIME(4), XFL, OS */
export const fixed_header_length = 10 as const;
/** subfield ID (2 bytes) + subfield length (2 bytes) */
export const extra_subfield_header_length = 4 as const;
