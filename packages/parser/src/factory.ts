import { extname } from "node:path";
import type { ILogParser } from "./parser.interface.js";
import { JsonArrayLogParser } from "./json-array-parser.js";
import { JsonLinesLogParser } from "./json-lines-parser.js";

const jsonArrayParser = new JsonArrayLogParser();
const jsonLinesParser = new JsonLinesLogParser();

const allParsers: ILogParser[] = [jsonArrayParser, jsonLinesParser];

/**
 * Select the parser for a source by its file extension.
 */
export function getLogParser(sourceId: string): ILogParser {
  const extension = extname(sourceId).toLowerCase();
  const parser = allParsers.find((p) => p.extensions.includes(extension));

  // Unknown extensions are read as a JSON array
  return parser ?? jsonArrayParser;
}
