import { debuglog } from "node:util";

export const io = debuglog("gzip:io");
export const cli = debuglog("gzip:cli");
