/**
 * Decoded gzip member header
 * Optional fields are present exactly when their bit is set in `flags`
 */
export interface GzipHeader{
  /** CM byte. Not validated: 8 (deflate) is the only defined value */
  readonly method :number;
  /** FLG byte, as found on the wire */
  readonly flags :number;
  /** Seconds since the unix epoch. 0 means no timestamp is available */
  readonly mtime :number;
  /** XFL byte. Compressor-specific */
  readonly extra_flags :number;
  readonly os :number;
  /** Number of FEXTRA subfields. Their content is skipped */
  readonly extra_subfield_count :number;
  readonly name :string|undefined;
  readonly comment :string|undefined;
  readonly header_crc :number|undefined;
}

/**
 * Synchronous source of bytes.
 * Every method throws if the stream ends or fails before the requested bytes could be read.
 */
export interface ByteReader{
  /** Number of bytes consumed so far */
  readonly position :number;
  read_byte() :number;
  read_exact(length :number) :Buffer;
  read_u16le() :number;
  read_u32le() :number;
}
