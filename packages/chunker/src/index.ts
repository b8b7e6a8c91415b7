export type { IChunker } from "./chunker.interface.js";
export { RecursiveChunker, joinSlices } from "./recursive-chunker.js";
export { buildDocuments, chunkDocuments, renderRecord } from "./document-builder.js";
export { chunkId } from "./chunk-id.js";
