export type QueryCommand =
  | { kind: "exit" }
  | { kind: "empty" }
  | { kind: "set-k"; k: number }
  | { kind: "set-threshold"; threshold: number }
  | { kind: "question"; text: string }
  | { kind: "invalid"; message: string };

const K_USAGE = "Usage: :k <positive integer>";
const THRESHOLD_USAGE = "Usage: :threshold <number between -1 and 1>";

/**
 * One line of interactive input. Lines starting with ":" are settings
 * commands; `exit` and `quit` (any case) end the session.
 */
export function parseQueryCommand(line: string): QueryCommand {
  const text = line.trim();

  if (text.length === 0) return { kind: "empty" };

  const lower = text.toLowerCase();
  if (lower === "exit" || lower === "quit") return { kind: "exit" };

  if (!text.startsWith(":")) return { kind: "question", text };

  const [name = "", ...rest] = text.slice(1).split(/\s+/);
  const argument = rest.join(" ");

  switch (name.toLowerCase()) {
    case "k": {
      if (!/^\d+$/.test(argument)) return { kind: "invalid", message: K_USAGE };
      const k = Number(argument);
      return k >= 1 ? { kind: "set-k", k } : { kind: "invalid", message: K_USAGE };
    }
    case "threshold": {
      const threshold = argument.length > 0 ? Number(argument) : Number.NaN;
      if (!Number.isFinite(threshold) || threshold < -1 || threshold > 1) {
        return { kind: "invalid", message: THRESHOLD_USAGE };
      }
      return { kind: "set-threshold", threshold };
    }
    default:
      return { kind: "invalid", message: `Unknown command: :${name}` };
  }
}
