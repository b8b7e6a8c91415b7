import type { LogRecord } from "@logrecall/types";
import { ParseError, errorMessage } from "@logrecall/errors";
import type { ILogParser } from "./parser.interface.js";
import { isLogRecord } from "./log-record.js";

/**
 * One JSON log record per line. Blank lines are ignored; the first bad line
 * fails the whole file.
 */
export class JsonLinesLogParser implements ILogParser {
  readonly format = "jsonl";
  readonly extensions = [".jsonl", ".ndjson"];

  parse(content: string, sourceId: string): LogRecord[] {
    const records: LogRecord[] = [];
    const lines = content.split(/\r?\n/);

    for (const [i, line] of lines.entries()) {
      if (line.trim().length === 0) continue;
      const lineNumber = i + 1;

      let data: unknown;
      try {
        data = JSON.parse(line);
      } catch (err: unknown) {
        throw new ParseError(
          `Invalid JSON on line ${String(lineNumber)} of ${sourceId}: ${errorMessage(err)}`,
          sourceId,
          { details: { line: lineNumber }, cause: err },
        );
      }

      if (!isLogRecord(data)) {
        throw new ParseError(
          `Line ${String(lineNumber)} of ${sourceId} is not an object with a timestamp`,
          sourceId,
          { details: { line: lineNumber } },
        );
      }
      records.push(data);
    }
    return records;
  }
}
