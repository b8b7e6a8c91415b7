/**
 * Credential-bearing keys that must never reach a log line.
 */
const SENSITIVE_KEYS = [
  "apiKey",
  "api_key",
  "openaiApiKey",
  "cohereApiKey",
  "qdrantApiKey",
  "authorization",
  "token",
  "password",
  "secret",
] as const;

/**
 * Paths for pino's `redact` option: each key at the top level and one level
 * of nesting (e.g. `embedding.openaiApiKey`).
 */
export const REDACT_PATHS: string[] = [
  ...SENSITIVE_KEYS,
  ...SENSITIVE_KEYS.map((key) => `*.${key}`),
];
