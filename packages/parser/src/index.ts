export type { ILogParser } from "./parser.interface.js";
export { JsonArrayLogParser } from "./json-array-parser.js";
export { JsonLinesLogParser } from "./json-lines-parser.js";
export { isLogRecord } from "./log-record.js";
export { getLogParser } from "./factory.js";
export { FileSystemSourceCatalog, InMemorySourceCatalog } from "./source-catalog.js";
export type { ISourceCatalog, FileSystemSourceCatalogOptions } from "./source-catalog.js";
