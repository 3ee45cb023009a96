import { DecodeError, truncated } from "../errors.js";
import type { ByteReader } from "../types.js";

//BOM is kept as part of the string
const utf8 = new TextDecoder("utf-8", {fatal: true, ignoreBOM: true});

/**
 * Reads a null-terminated UTF-8 string.
 * The terminator is consumed but not part of the result.
 * @note There is no length limit. Wrap the reader if you need one.
 */
export function read_c_string(reader :ByteReader, field :string = "string") :string{
  let bytes :number[] = [];
  const next = ()=> truncated(()=> reader.read_byte(), `${field} is not null-terminated`);
  for(let c = next(); c !== 0; c = next()){
    bytes.push(c);
  }
  try{
    return utf8.decode(Uint8Array.from(bytes));
  }catch(e){
    throw new DecodeError("INVALID_TEXT", `expected utf8 ${field}`, {cause: e});
  }
}
