export * from "./psyqObjParser";
export * from "./objectFile";
export * from "./expressions";
export * from "./constants";
export * from "./errors";
export * from "./logger";
export { BufferReader } from "./bufferReader";
export { dumpObjectFile } from "./objectDump";
