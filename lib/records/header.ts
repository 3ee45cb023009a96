import { flags, magic } from "../constants.js";
import { DecodeError, truncated } from "../errors.js";
import type { ByteReader, GzipHeader } from "../types.js";
import { parse_extra_subfields } from "./extra.js";
import { read_c_string } from "./string.js";


/**
 * Decodes a gzip member header, leaving the reader right before the compressed data.
 * 
 * The fixed 10 bytes are read as a whole before the magic is checked:
 * a stream shorter than that is reported as truncated, whatever its first bytes.
 * 
 * The header's CRC16 is reported but not verified.
 * @throws {DecodeError} on the first failed read or inconsistency. No partial header is returned.
 * @see https://www.rfc-editor.org/rfc/rfc1952#section-2.3
 */
export function parse_gzip_header(reader :ByteReader) :GzipHeader{
  const {id1, id2, method, flg, mtime, xfl, os} = truncated(()=>({
    id1: reader.read_byte(),
    id2: reader.read_byte(),
    method: reader.read_byte(),
    flg: reader.read_byte(),
    mtime: reader.read_u32le(),
    xfl: reader.read_byte(),
    os: reader.read_byte(),
  }), "malformed gzip header");

  if(id1 !== magic[0] || id2 !== magic[1]){
    throw new DecodeError("MAGIC_MISMATCH", `magic mismatch: expected 0x1f8b, found 0x${((id1 << 8) | id2).toString(16).padStart(4, "0")}`);
  }

  // FTEXT has no effect on the header layout
  const extra_subfield_count = (flg & flags.FEXTRA)? parse_extra_subfields(reader) : 0;
  const name = (flg & flags.FNAME)? read_c_string(reader, "file name") : undefined;
  const comment = (flg & flags.FCOMMENT)? read_c_string(reader, "comment") : undefined;
  const header_crc = (flg & flags.FHCRC)? truncated(()=> reader.read_u16le(), "Can't read header CRC16") : undefined;

  return Object.freeze({
    method,
    flags: flg,
    mtime,
    extra_flags: xfl,
    os,
    extra_subfield_count,
    name,
    comment,
    header_crc,
  });
}

/**
 * Check for a flag on a decoded header
 */
export function has_flag(header :GzipHeader, flag :number) :boolean{
  return (header.flags & flag) === flag;
}
