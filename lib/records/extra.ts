import { extra_subfield_header_length } from "../constants.js";
import { DecodeError, truncated } from "../errors.js";
import type { ByteReader } from "../types.js";


/**
 * Walks the FEXTRA subfield list and returns the number of subfields.
 * Subfield IDs and payloads are skipped without interpretation.
 * Each subfield must fit exactly within XLEN.
 */
export function parse_extra_subfields(reader :ByteReader) :number{
  let xlen = truncated(()=> reader.read_u16le(), "Can't read FEXTRA length");
  let count = 0;

  while(0 < xlen){
    if(xlen < extra_subfield_header_length){
      throw new DecodeError("MALFORMED_EXTRA", `malformed FEXTRA: ${xlen} bytes left, too short for a subfield header`);
    }
    let sublen = truncated(()=>{
      reader.read_exact(2); // SI1, SI2
      return reader.read_u16le();
    }, `Can't read FEXTRA subfield ${count} header`);
    xlen -= extra_subfield_header_length;

    if(xlen < sublen){
      throw new DecodeError("MALFORMED_EXTRA", `malformed FEXTRA: subfield ${count} declares ${sublen} bytes but only ${xlen} remain`);
    }
    truncated(()=> reader.read_exact(sublen), `Can't read FEXTRA subfield ${count} (${sublen} bytes)`);
    xlen -= sublen;
    count++;
  }
  return count;
}
