import { createHash } from "node:crypto";

/**
 * Deterministic UUID-shaped id for a chunk. Same source, position and content
 * always give the same id, so writing a chunk again overwrites its point.
 */
export function chunkId(source: string, documentIndex: number, chunkIndex: number, content: string): string {
  const hex = createHash("sha256")
    .update(`${source}\u0000${String(documentIndex)}\u0000${String(chunkIndex)}\u0000${content}`)
    .digest("hex");

  const variant = ((parseInt(hex.charAt(16), 16) & 0x3) | 0x8).toString(16);

  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    `5${hex.slice(13, 16)}`,
    `${variant}${hex.slice(17, 20)}`,
    hex.slice(20, 32),
  ].join("-");
}
