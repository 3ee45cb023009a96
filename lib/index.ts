import fs from "node:fs";

import type { GzipHeader } from "./types.js";
import { parse_gzip_header } from "./records/header.js";
import { BufferReader, FdReader } from "./utils/reader.js";
import type { FdReaderOptions } from "./utils/reader.js";

import * as log from "./utils/debug.js";

export * from "./constants.js";
export type { ByteReader, GzipHeader } from "./types.js";
export { DecodeError, EndOfStreamError, is_decode_error } from "./errors.js";
export type { DecodeErrorCode } from "./errors.js";
export { BaseReader, BufferReader, FdReader } from "./utils/reader.js";
export type { FdReaderOptions } from "./utils/reader.js";
export { parse_gzip_header, has_flag } from "./records/header.js";
export { describe_method, describe_os, format_gzip_header } from "./format.js";
export type { FormatOptions } from "./format.js";


/**
 * Reads the header at the start of a buffer, a file, or an open file descriptor.
 * A file descriptor is read from its current position and is not closed.
 * Unless `chunk_size` is given it is left right before the compressed data.
 * Files opened from a path are read in 64kB chunks.
 */
export function read_gzip_header(data :Buffer, options ?:FdReaderOptions) :GzipHeader
export function read_gzip_header(filepath :string, options ?:FdReaderOptions) :GzipHeader
export function read_gzip_header(fd :number, options ?:FdReaderOptions) :GzipHeader
export function read_gzip_header(source :Buffer|string|number, options :FdReaderOptions = {}) :GzipHeader{
  if(Buffer.isBuffer(source)){
    return parse_gzip_header(new BufferReader(source));
  }
  let fd = (typeof source === "string")? fs.openSync(source, "r") : source;
  if(typeof source === "string") log.io(`Opened ${source} as fd ${fd}`);
  try{
    return parse_gzip_header(new FdReader(fd, (typeof source === "string")? {chunk_size: 64*1024, ...options} : options));
  }finally{
    if(typeof source === "string") fs.closeSync(fd);
  }
}
