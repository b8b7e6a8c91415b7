import type { LogRecord } from "@logrecall/types";
import { ParseError, errorMessage } from "@logrecall/errors";
import type { ILogParser } from "./parser.interface.js";
import { isLogRecord } from "./log-record.js";

/**
 * A source file holding one JSON array of log records.
 */
export class JsonArrayLogParser implements ILogParser {
  readonly format = "json";
  readonly extensions = [".json"];

  parse(content: string, sourceId: string): LogRecord[] {
    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (err: unknown) {
      throw new ParseError(`Invalid JSON in ${sourceId}: ${errorMessage(err)}`, sourceId, {
        cause: err,
      });
    }

    if (!Array.isArray(data)) {
      throw new ParseError(`Expected a JSON array of log records in ${sourceId}`, sourceId);
    }

    const records: LogRecord[] = [];
    for (const [i, item] of data.entries()) {
      if (!isLogRecord(item)) {
        throw new ParseError(
          `Record ${String(i)} in ${sourceId} is not an object with a timestamp`,
          sourceId,
          { details: { recordIndex: i } },
        );
      }
      records.push(item);
    }
    return records;
  }
}
