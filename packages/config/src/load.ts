import { ZodError } from "zod";
import { ValidationError } from "@logrecall/errors";
import type { AppConfig } from "@logrecall/types";
import { parseEnv } from "./env.js";

/**
 * {@link parseEnv} for entry points: schema failures become a single
 * ValidationError listing every offending variable.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  try {
    return parseEnv(env);
  } catch (error: unknown) {
    if (!(error instanceof ZodError)) throw error;

    const fields: Record<string, string> = {};
    for (const issue of error.issues) {
      const key = issue.path.join(".") || "env";
      fields[key] ??= issue.message;
    }
    const summary = Object.entries(fields)
      .map(([key, message]) => `${key}: ${message}`)
      .join("; ");

    throw new ValidationError(`Invalid configuration: ${summary}`, fields, { cause: error });
  }
}
