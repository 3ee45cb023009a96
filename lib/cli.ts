import minimist from "minimist";

import { format_gzip_header, read_gzip_header } from "./index.js";
import { is_decode_error } from "./errors.js";

import * as log from "./utils/debug.js";

export interface Output{
  write(chunk :string) :unknown;
}

export const usage = "usage: gzip-header [--names] [file]";

function is_system_error(e :unknown) :e is NodeJS.ErrnoException{
  return e instanceof Error && "code" in e && typeof e.code === "string";
}

/**
 * Prints the header of a gzip file, or of stdin when no file is given.
 * @param stdin file descriptor read when no file (or "-") is given
 * @returns the process exit code
 */
export function main(args :string[], stdout :Output = process.stdout, stderr :Output = process.stderr, stdin :number = 0) :number{
  let unknown :string[] = [];
  const argv = minimist(args, {
    boolean: ["names", "help"],
    string: ["_"],
    alias: {h: "help"},
    unknown: (arg)=>{
      if(arg.startsWith("-") && arg !== "-"){
        unknown.push(arg);
        return false;
      }
      return true;
    },
  });

  if(argv.help){
    stdout.write(usage + "\n");
    return 0;
  }
  if(0 < unknown.length){
    stderr.write(`unknown option: ${unknown.join(", ")}\n${usage}\n`);
    return 2;
  }
  if(1 < argv._.length){
    stderr.write(`${usage}\n`);
    return 2;
  }
  const file = argv._[0];
  log.cli(`Reading gzip header from ${file ?? "stdin"}`);

  try{
    let header = (typeof file === "undefined" || file === "-")? read_gzip_header(stdin) : read_gzip_header(file);
    stdout.write(format_gzip_header(header, {names: argv.names === true}) + "\n");
    return 0;
  }catch(e){
    if(is_decode_error(e)){
      log.cli(`Decode failed with ${e.code}`);
      stderr.write(`reading gzip header failed: ${e.message}\n`);
      return 1;
    }else if(is_system_error(e)){
      log.cli(`I/O failed with ${e.code}`);
      stderr.write(`gzip-header: ${e.message}\n`);
      return 1;
    }
    throw e;
  }
}
