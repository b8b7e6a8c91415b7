import type { QueryFilter } from "@logrecall/types";
import { QUERY_FILTER_ALLOWLIST } from "@logrecall/types";
import { ValidationError } from "@logrecall/errors";

/**
 * Allowlist-only filter validation. Unknown fields are rejected rather than
 * ignored, so a typo never silently widens a search.
 */
export function validateQueryFilter(filter: unknown): QueryFilter {
  if (typeof filter !== "object" || filter === null || Array.isArray(filter)) {
    throw new ValidationError("filter must be a plain object", { filter: "not an object" });
  }

  const allowedFields = new Set<string>(QUERY_FILTER_ALLOWLIST);

  for (const key of Object.keys(filter)) {
    if (!allowedFields.has(key)) {
      throw new ValidationError(
        `Invalid filter field: "${key}". Allowed fields: ${[...allowedFields].join(", ")}`,
        { [key]: "not allowed" },
      );
    }
  }

  const sources: unknown = "sources" in filter ? filter.sources : undefined;
  if (sources === undefined) {
    return {};
  }

  if (!Array.isArray(sources)) {
    throw new ValidationError("filter.sources must be an array of strings", { sources: "not an array" });
  }

  const validated: string[] = [];
  for (const source of sources) {
    if (typeof source !== "string" || source.length === 0) {
      throw new ValidationError("Each source must be a non-empty string", { sources: "invalid entry" });
    }
    validated.push(source);
  }

  return { sources: validated };
}
