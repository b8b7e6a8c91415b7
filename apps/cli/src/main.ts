import "dotenv/config";
import { parseArgs } from "node:util";
import { loadConfig } from "@logrecall/config";
import { AppError, ValidationError, errorMessage } from "@logrecall/errors";
import { createLogger } from "@logrecall/logger";
import { ingestCommand } from "./commands/ingest.js";
import { queryCommand } from "./commands/query.js";

const USAGE = `Usage:
  logrecall ingest [--collection <name>]
  logrecall query  [--collection <name>] [--k <n>] [--threshold <x>]

Interactive query commands:
  :k <n>          number of chunks to retrieve
  :threshold <x>  minimum cosine similarity (-1 to 1)
  exit | quit     leave`;

function parseNumberFlag(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim().length === 0 || !Number.isFinite(parsed)) {
    throw new ValidationError(`--${name} must be a number`, { [name]: value });
  }
  return parsed;
}

async function main(argv: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      collection: { type: "string", short: "c" },
      k: { type: "string" },
      threshold: { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
  });

  const command = positionals[0];

  if (values.help || command === undefined || command === "help") {
    console.log(USAGE);
    return command === undefined && !values.help ? 1 : 0;
  }

  const config = loadConfig();
  const logger = createLogger({
    level: config.logLevel,
    service: "logrecall",
    pretty: config.nodeEnv === "development",
  });

  switch (command) {
    case "ingest":
      await ingestCommand(config, { collection: values.collection }, logger);
      return 0;
    case "query":
      await queryCommand(
        config,
        {
          collection: values.collection,
          k: parseNumberFlag("k", values.k),
          threshold: parseNumberFlag("threshold", values.threshold),
        },
        logger,
      );
      return 0;
    default:
      console.error(`Unknown command: ${command}\n\n${USAGE}`);
      return 1;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    if (AppError.isAppError(error)) {
      console.error(`[logrecall] ${error.code}: ${error.message}`);
    } else {
      console.error(`[logrecall] Fatal error: ${errorMessage(error)}`);
    }
    process.exitCode = 1;
  },
);
