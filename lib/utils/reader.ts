import fs from "node:fs";

import { EndOfStreamError } from "../errors.js";
import type { ByteReader } from "../types.js";

import * as log from "./debug.js";

/**
 * Derives byte and little-endian integer reads from `read_exact()`
 */
export abstract class BaseReader implements ByteReader{
  abstract get position() :number;
  abstract read_exact(length :number) :Buffer;

  read_byte() :number{
    return this.read_exact(1).readUInt8(0);
  }
  read_u16le() :number{
    return this.read_exact(2).readUInt16LE(0);
  }
  read_u32le() :number{
    return this.read_exact(4).readUInt32LE(0);
  }
}

/**
 * Reads from an in-memory buffer.
 * A failed read consumes nothing.
 */
export class BufferReader extends BaseReader{
  private offset = 0;

  constructor(private readonly data :Buffer){
    super();
  }

  get position() :number{
    return this.offset;
  }

  remaining() :number{
    return this.data.length - this.offset;
  }

  read_exact(length :number) :Buffer{
    if(this.remaining() < length){
      throw new EndOfStreamError(length, this.remaining());
    }
    let b = this.data.subarray(this.offset, this.offset + length);
    this.offset += length;
    return b;
  }
}

export interface FdReaderOptions{
  /**
   * Size of the internal read-ahead buffer.
   * When unset, reads request exactly the missing bytes and the descriptor is left right after the last byte consumed.
   */
  chunk_size ?:number;
}

/**
 * Blocking reads from a file descriptor, from its current position, so it works for pipes and stdin.
 * With a `chunk_size`, bytes read ahead but not consumed are lost to the descriptor.
 */
export class FdReader extends BaseReader{
  private chunk :Buffer|undefined;
  private start = 0;
  private end = 0;
  private consumed = 0;

  constructor(private readonly fd :number, {chunk_size} :FdReaderOptions = {}){
    super();
    if(typeof chunk_size !== "undefined"){
      if(!Number.isInteger(chunk_size) || chunk_size < 1){
        throw new RangeError(`chunk_size must be a positive integer, received ${chunk_size}`);
      }
      this.chunk = Buffer.allocUnsafe(chunk_size);
    }
  }

  get position() :number{
    return this.consumed;
  }

  private read_into(b :Buffer, offset :number, length :number) :number{
    const bytesRead = fs.readSync(this.fd, b, offset, length, null);
    log.io("Read %d bytes from fd %d", bytesRead, this.fd);
    return bytesRead;
  }

  read_exact(length :number) :Buffer{
    let out = Buffer.allocUnsafe(length);
    let copied = 0;
    while(copied < length){
      let n :number;
      if(!this.chunk){
        n = this.read_into(out, copied, length - copied);
      }else{
        if(this.start === this.end){
          this.start = 0;
          this.end = this.read_into(this.chunk, 0, this.chunk.length);
        }
        n = this.chunk.copy(out, copied, this.start, Math.min(this.end, this.start + length - copied));
        this.start += n;
      }
      if(n === 0){
        throw new EndOfStreamError(length, copied);
      }
      this.consumed += n;
      copied += n;
    }
    return out;
  }
}
