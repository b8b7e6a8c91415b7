import type { ChunkingConfig, TextSlice } from "@logrecall/types";

export interface IChunker {
  readonly strategy: string;
  chunk(content: string, config: ChunkingConfig): TextSlice[];
}
