import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { glob } from "glob";

/**
 * Where source files come from. `list` must return ids in a deterministic order.
 */
export interface ISourceCatalog {
  list(): Promise<string[]>;
  read(sourceId: string): Promise<string>;
}

export interface FileSystemSourceCatalogOptions {
  /** Directory the pattern and the returned ids are relative to. Default: process.cwd() */
  cwd?: string;
}

/**
 * Discovers log files with a glob pattern; ids are the matched paths, sorted.
 */
export class FileSystemSourceCatalog implements ISourceCatalog {
  private readonly pattern: string;
  private readonly cwd: string;

  constructor(pattern: string, options?: FileSystemSourceCatalogOptions) {
    this.pattern = pattern;
    this.cwd = options?.cwd ?? process.cwd();
  }

  async list(): Promise<string[]> {
    const matches = await glob(this.pattern, { cwd: this.cwd, nodir: true });
    return matches.sort();
  }

  async read(sourceId: string): Promise<string> {
    return readFile(resolve(this.cwd, sourceId), "utf8");
  }
}

export class InMemorySourceCatalog implements ISourceCatalog {
  private readonly files: Map<string, string>;

  constructor(files: Record<string, string> = {}) {
    this.files = new Map(Object.entries(files));
  }

  set(sourceId: string, content: string): void {
    this.files.set(sourceId, content);
  }

  async list(): Promise<string[]> {
    return [...this.files.keys()].sort();
  }

  async read(sourceId: string): Promise<string> {
    const content = this.files.get(sourceId);
    if (content === undefined) {
      throw new Error(`Unknown source: ${sourceId}`);
    }
    return content;
  }
}
