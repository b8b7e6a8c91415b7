import type { Answer, IngestionRunResult, SourceStatus } from "@logrecall/types";

export function formatAnswer(answer: Answer): string {
  if (answer.refused || answer.citations.length === 0) {
    return answer.text;
  }

  const sources = answer.citations.map(
    (citation, i) => `  [${String(i + 1)}] ${citation.source} (score ${citation.score.toFixed(3)})`,
  );

  return [answer.text, "", "Sources:", ...sources].join("\n");
}

const STATUS_ORDER: SourceStatus[] = ["ingested", "skipped", "empty", "parse_failed", "write_failed"];

export function formatIngestionSummary(result: IngestionRunResult): string {
  const counts = STATUS_ORDER.map(
    (status) => `${status}=${String(result.outcomes.filter((o) => o.status === status).length)}`,
  );

  const lines = [
    `Collection ${result.collectionName}: ${String(result.outcomes.length)} file(s), ${String(result.chunksWritten)} chunk(s) written`,
    `  ${counts.join(" ")}`,
  ];

  for (const outcome of result.outcomes) {
    if (outcome.error) {
      lines.push(`  ${outcome.status} ${outcome.source}: ${outcome.error}`);
    }
  }

  if (result.cancelled) {
    lines.push("  cancelled before all files were processed");
  }

  return lines.join("\n");
}
