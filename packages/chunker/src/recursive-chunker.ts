import type { ChunkingConfig, TextSlice } from "@logrecall/types";
import type { IChunker } from "./chunker.interface.js";

/** Paragraph, line, word, then single characters (""). */
const DEFAULT_SEPARATORS = ["\n\n", "\n", " ", ""];

interface Span {
  start: number;
  end: number;
}

/**
 * Recursive character splitting with a separator hierarchy.
 *
 * Text is cut into pieces on the largest separator that brings every piece
 * under `chunkSize`, falling back to smaller separators only for pieces that
 * are still too long. Separators stay attached to the piece they end, so
 * pieces are contiguous and every chunk is an exact slice of the input.
 * Pieces are then merged greedily; each new chunk starts with trailing pieces
 * of the previous one, totalling at most `chunkOverlap` characters.
 */
export class RecursiveChunker implements IChunker {
  readonly strategy = "recursive";
  private separators: string[];

  constructor(separators?: string[]) {
    this.separators = separators ?? DEFAULT_SEPARATORS;
  }

  chunk(content: string, config: ChunkingConfig): TextSlice[] {
    const { chunkSize, chunkOverlap } = config;
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new Error(`chunkSize must be a positive integer, got ${String(chunkSize)}`);
    }
    if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
      throw new Error(
        `chunkOverlap must be an integer in [0, chunkSize), got ${String(chunkOverlap)}`,
      );
    }

    if (content.length === 0) return [];

    const pieces = this.splitRecursive(content, { start: 0, end: content.length }, chunkSize, 0);
    return this.merge(content, pieces, chunkSize, chunkOverlap);
  }

  private splitRecursive(text: string, span: Span, chunkSize: number, separatorIndex: number): Span[] {
    if (span.end - span.start <= chunkSize) {
      return [span];
    }

    const separator = this.separators[separatorIndex];

    if (separator === undefined || separator === "") {
      // Single characters (or hard cuts once the custom separators run out)
      const width = separator === "" ? 1 : chunkSize;
      const results: Span[] = [];
      for (let i = span.start; i < span.end; i += width) {
        results.push({ start: i, end: Math.min(i + width, span.end) });
      }
      return results;
    }

    const results: Span[] = [];
    let pieceStart = span.start;
    let found = text.indexOf(separator, span.start);

    while (found !== -1 && found + separator.length <= span.end) {
      const pieceEnd = found + separator.length;
      this.appendSplit(results, text, { start: pieceStart, end: pieceEnd }, chunkSize, separatorIndex + 1);
      pieceStart = pieceEnd;
      found = text.indexOf(separator, pieceEnd);
    }

    if (pieceStart < span.end) {
      this.appendSplit(results, text, { start: pieceStart, end: span.end }, chunkSize, separatorIndex + 1);
    }

    return results;
  }

  // Character-level splits can yield more spans than a call may take as arguments
  private appendSplit(
    results: Span[],
    text: string,
    span: Span,
    chunkSize: number,
    separatorIndex: number,
  ): void {
    for (const piece of this.splitRecursive(text, span, chunkSize, separatorIndex)) {
      results.push(piece);
    }
  }

  private merge(text: string, pieces: Span[], chunkSize: number, chunkOverlap: number): TextSlice[] {
    const results: TextSlice[] = [];
    let current: Span[] = [];
    let currentLength = 0;
    let overlap = 0;

    const flush = (): void => {
      const first = current[0];
      const last = current[current.length - 1];
      if (!first || !last) return;
      results.push({
        content: text.slice(first.start, last.end),
        index: results.length,
        startChar: first.start,
        endChar: last.end,
        overlap,
      });
    };

    for (const piece of pieces) {
      const pieceLength = piece.end - piece.start;

      if (current.length > 0 && currentLength + pieceLength > chunkSize) {
        flush();

        // Carry trailing pieces, never the whole previous chunk
        const carried: Span[] = [];
        let carriedLength = 0;
        for (let i = current.length - 1; i >= 1; i--) {
          const span = current[i];
          if (!span) break;
          const length = span.end - span.start;
          if (carriedLength + length > chunkOverlap || carriedLength + length + pieceLength > chunkSize) {
            break;
          }
          carried.unshift(span);
          carriedLength += length;
        }

        current = carried;
        currentLength = carriedLength;
        overlap = carriedLength;
      }

      current.push(piece);
      currentLength += pieceLength;
    }

    flush();
    return results;
  }
}

/**
 * Rebuild the chunked text: the first chunk whole, then each later chunk
 * without its leading overlap.
 */
export function joinSlices(slices: Pick<TextSlice, "content" | "overlap">[]): string {
  return slices.map((slice) => slice.content.slice(slice.overlap)).join("");
}
