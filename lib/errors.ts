export type DecodeErrorCode = "TRUNCATED_HEADER" | "MAGIC_MISMATCH" | "MALFORMED_EXTRA" | "INVALID_TEXT";

/**
 * Terminal failure of a header decode.
 * The stream position is unspecified afterwards: it must not be decoded again.
 */
export class DecodeError extends Error{
  readonly code :DecodeErrorCode;
  constructor(code :DecodeErrorCode, message :string, options ?:ErrorOptions){
    super(message, options);
    this.name = "DecodeError";
    this.code = code;
  }
}

/**
 * Thrown by readers when fewer bytes than requested are left
 */
export class EndOfStreamError extends Error{
  readonly requested :number;
  readonly available :number;
  constructor(requested :number, available :number){
    super(`Unexpected end of stream (wanted ${requested} bytes, got ${available})`);
    this.name = "EndOfStreamError";
    this.requested = requested;
    this.available = available;
  }
}

export function is_decode_error(e :unknown, code ?:DecodeErrorCode) :e is DecodeError{
  return e instanceof DecodeError && (typeof code === "undefined" || e.code === code);
}

/**
 * Runs a sequence of reads, reporting any reader failure as a TRUNCATED_HEADER.
 * DecodeErrors raised in between pass through unchanged.
 */
export function truncated<T>(read :()=>T, message :string) :T{
  try{
    return read();
  }catch(e){
    if(e instanceof DecodeError) throw e;
    throw new DecodeError("TRUNCATED_HEADER", message, {cause: e});
  }
}
