import { flags as f, fixed_header_length, extra_subfield_header_length } from "../constants.js";

export type ExtraData = Map<number, Buffer>;

export interface GzipHeaderParams{
  method ?:number;
  /** Bits to set in addition to those implied by the optional fields (eg. FTEXT) */
  flags ?:number;
  mtime ?:number;
  extra_flags ?:number;
  os ?:number;
  extra ?:ExtraData;
  name ?:string;
  comment ?:string;
  header_crc ?:number;
}

/**
 * Encodes a FEXTRA field: XLEN followed by each subfield.
 */
export function create_extra_field(extra :ExtraData) :Buffer{
  let length = 0;
  for(let data of extra.values()){
    length += extra_subfield_header_length + data.length;
  }
  let b = Buffer.allocUnsafe(2 + length);
  let offset = b.writeUInt16LE(length, 0);
  for(let [id, data] of extra.entries()){
    offset = b.writeUInt16LE(id, offset);
    offset = b.writeUInt16LE(data.length, offset);
    offset += data.copy(b, offset);
  }
  return b;
}

/**
 * Minimal gzip header encoder, for tests only.
 * Flag bits for optional fields are derived from which fields are provided.
 */
export function create_gzip_header({method = 8, flags = 0, mtime = 0, extra_flags = 0, os = 3, extra, name, comment, header_crc} :GzipHeaderParams = {}) :Buffer{
  let parts :Buffer[] = [];
  if(extra){
    flags |= f.FEXTRA;
    parts.push(create_extra_field(extra));
  }
  if(typeof name === "string"){
    flags |= f.FNAME;
    parts.push(Buffer.from(name, "utf-8"), Buffer.alloc(1));
  }
  if(typeof comment === "string"){
    flags |= f.FCOMMENT;
    parts.push(Buffer.from(comment, "utf-8"), Buffer.alloc(1));
  }
  if(typeof header_crc === "number"){
    flags |= f.FHCRC;
    let crc = Buffer.allocUnsafe(2);
    crc.writeUInt16LE(header_crc, 0);
    parts.push(crc);
  }

  let header = Buffer.allocUnsafe(fixed_header_length);
  header.writeUInt8(0x1f, 0);
  header.writeUInt8(0x8b, 1);
  header.writeUInt8(method, 2);
  header.writeUInt8(flags, 3);
  header.writeUInt32LE(mtime, 4);
  header.writeUInt8(extra_flags, 8);
  header.writeUInt8(os, 9);
  return Buffer.concat([header, ...parts]);
}
