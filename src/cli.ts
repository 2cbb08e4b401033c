import { parseArgs } from "node:util";
import { ConfigurationError, RagError, errorMessage } from "./rag/errors.js";
import type { Logger } from "./utils/logger.js";

export interface CliArgs {
  rescrape: boolean;
  add: boolean;
  files: string[];
}

const USAGE = "Usage: chat [--rescrape] | ingest [--rescrape] [--add <file.pdf>...]";

function parseOptions(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        rescrape: { type: "boolean", default: false },
        add: { type: "boolean", default: false },
      },
      allowPositionals: true,
    });
  } catch (err) {
    throw new ConfigurationError(errorMessage(err), USAGE);
  }
}

export function parseCliArgs(argv: string[]): CliArgs {
  const { values, positionals } = parseOptions(argv);
  return {
    rescrape: values.rescrape ?? false,
    add: values.add ?? false,
    files: positionals,
  };
}

export type ChatInput = { kind: "exit" } | { kind: "empty" } | { kind: "question"; text: string };

const EXIT_COMMANDS = new Set(["exit", "quit", "q"]);

export function parseChatInput(raw: string): ChatInput {
  const text = raw.trim();
  if (!text) return { kind: "empty" };
  if (EXIT_COMMANDS.has(text.toLowerCase())) return { kind: "exit" };
  return { kind: "question", text };
}

/** Prints a fatal error the way the operator needs to see it and returns the exit code. */
export function reportFatal(err: unknown, logger: Logger): number {
  if (err instanceof ConfigurationError) {
    console.error(`Error: ${err.message}`);
    if (err.remediation) console.error(`  ${err.remediation}`);
    return 1;
  }
  if (err instanceof RagError) {
    logger.error({ code: err.code, err }, err.message);
    return 1;
  }
  logger.error({ err }, `unexpected error: ${errorMessage(err)}`);
  return 1;
}
