// File I/O for the XDR codec.

export { FileSink, FileSource, decodeFromFile, encodeToFile } from "./file.ts";
