import type { LogRecord, SourceFormat } from "@logrecall/types";

export interface ILogParser {
  readonly format: SourceFormat;
  readonly extensions: string[];
  /** Parse a whole source file; any invalid record fails the file. */
  parse(content: string, sourceId: string): LogRecord[];
}
