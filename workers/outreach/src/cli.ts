/**
 * Command-line parsing for the outreach worker (node:util parseArgs).
 */

import { parseArgs } from "node:util";

export interface CliOptions {
  readonly configPath: string;
  readonly ignoreState: boolean;
  readonly dryRun: boolean;
}

export type CliParseResult =
  | { readonly kind: "run"; readonly options: CliOptions }
  | { readonly kind: "help" };

/** Bad arguments. The caller prints the message with the usage text. */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

function parseRaw(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      options: {
        "ignore-state": { type: "boolean", default: false },
        "dry-run": { type: "boolean", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
    });
  } catch (err) {
    throw new CliUsageError(err instanceof Error ? err.message : String(err));
  }
}

/** @throws CliUsageError */
export function parseCliArgs(argv: readonly string[]): CliParseResult {
  const { values, positionals } = parseRaw(argv);
  if (values.help) {
    return { kind: "help" };
  }

  if (positionals.length === 0) {
    throw new CliUsageError("missing config file path");
  }
  if (positionals.length > 1) {
    throw new CliUsageError(`unexpected argument: ${positionals[1]}`);
  }

  return {
    kind: "run",
    options: {
      configPath: positionals[0],
      ignoreState: values["ignore-state"] ?? false,
      dryRun: values["dry-run"] ?? false,
    },
  };
}
