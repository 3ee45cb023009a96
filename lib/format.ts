import { ECompression, EOperatingSystem } from "./constants.js";
import type { GzipHeader } from "./types.js";

const os_names :Record<number, string> = {
  [EOperatingSystem.FAT]: "FAT filesystem (MS-DOS, OS/2, NT/Win32)",
  [EOperatingSystem.AMIGA]: "Amiga",
  [EOperatingSystem.VMS]: "VMS",
  [EOperatingSystem.UNIX]: "Unix",
  [EOperatingSystem.VM_CMS]: "VM/CMS",
  [EOperatingSystem.ATARI_TOS]: "Atari TOS",
  [EOperatingSystem.HPFS]: "HPFS filesystem (OS/2, NT)",
  [EOperatingSystem.MACINTOSH]: "Macintosh",
  [EOperatingSystem.Z_SYSTEM]: "Z-System",
  [EOperatingSystem.CP_M]: "CP/M",
  [EOperatingSystem.TOPS_20]: "TOPS-20",
  [EOperatingSystem.NTFS]: "NTFS filesystem (NT)",
  [EOperatingSystem.QDOS]: "QDOS",
  [EOperatingSystem.ACORN_RISCOS]: "Acorn RISCOS",
  [EOperatingSystem.UNKNOWN]: "unknown",
};

export function describe_os(os :number) :string|undefined{
  return os_names[os];
}

export function describe_method(method :number) :string|undefined{
  if(method === ECompression.DEFLATE) return "deflate";
  if(0 <= method && method < ECompression.DEFLATE) return "reserved";
  return undefined;
}

export interface FormatOptions{
  /** Append known method and OS names after their codes */
  names ?:boolean;
}

function hex(n :number) :string{
  return `0x${n.toString(16)}`;
}

function option<T>(value :T|undefined, show :(v :T)=>string = String) :string{
  return (typeof value === "undefined")? "None" : `Some(${show(value)})`;
}

function named(code :number, name :string|undefined, names :boolean) :string{
  return (names && name)? `${hex(code)} (${name})` : hex(code);
}

/**
 * One-line summary of a header
 * @example
 * gzip header: method 0x8, flg 0x8, mtime 0, xfl 0x0, os 0x3, fextra_count 0x0, fname Some(a.txt), fcomment None, fhcrc None
 */
export function format_gzip_header(h :GzipHeader, {names = false} :FormatOptions = {}) :string{
  return `gzip header: method ${named(h.method, describe_method(h.method), names)}`
    +`, flg ${hex(h.flags)}`
    +`, mtime ${h.mtime}`
    +`, xfl ${hex(h.extra_flags)}`
    +`, os ${named(h.os, describe_os(h.os), names)}`
    +`, fextra_count ${hex(h.extra_subfield_count)}`
    +`, fname ${option(h.name)}`
    +`, fcomment ${option(h.comment)}`
    +`, fhcrc ${option(h.header_crc, hex)}`;
}
