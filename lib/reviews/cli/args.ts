/**
 * Command-line argument parsing for scripts/reviews.ts
 */

import { z } from "zod";
import { runArgsSchema, tombstoneArgsSchema, type RunArgs, type TombstoneArgs } from "../api/schemas";
import { CliUsageError } from "../errors";

export const USAGE = `Usage: reviews <command> [options]

Commands:
  run [--full] [--concurrency N] [--rate-limit MS] [--max-pages N]
      Discover and ingest reviews. --full ignores checkpoints.
  export [--out PATH] [--proximity-only] [--cuisines PATH]
      Write live restaurant records as JSON, and optionally the
      cuisine list with restaurant counts.
  tombstone <restaurantId> --confirm [--reason TEXT]
      Mark a restaurant as removed.
  invalidate-location <text>
      Drop the cached geocode for a location text.
  runs [--limit N]
      Print recent run summaries.
`;

export type CliCommand =
  | { command: "run"; args: RunArgs }
  | { command: "export"; out?: string; proximityOnly: boolean; cuisinesOut?: string }
  | { command: "tombstone"; args: TombstoneArgs }
  | { command: "invalidate-location"; text: string }
  | { command: "runs"; limit: number }
  | { command: "help" };

type FlagValue = string | true;

interface Tokens {
  positionals: string[];
  flags: Map<string, FlagValue>;
}

const BOOLEAN_FLAGS = new Set(["full", "proximity-only", "confirm", "help"]);

function tokenize(argv: readonly string[]): Tokens {
  const positionals: string[] = [];
  const flags = new Map<string, FlagValue>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith("--")) {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf("=");
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    if (eq !== -1) {
      flags.set(name, arg.slice(eq + 1));
    } else if (BOOLEAN_FLAGS.has(name)) {
      flags.set(name, true);
    } else {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new CliUsageError(`--${name} needs a value`);
      }
      flags.set(name, value);
      i++;
    }
  }

  return { positionals, flags };
}

function stringFlag(flags: Map<string, FlagValue>, name: string): string | undefined {
  const value = flags.get(name);
  if (value === true) throw new CliUsageError(`--${name} needs a value`);
  return value;
}

function rejectUnknown(flags: Map<string, FlagValue>, allowed: string[]): void {
  for (const name of flags.keys()) {
    if (!allowed.includes(name)) {
      throw new CliUsageError(`Unknown option --${name}`);
    }
  }
}

function validate<T>(schema: z.ZodType<T>, input: unknown): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new CliUsageError(z.prettifyError(parsed.error));
  }
  return parsed.data;
}

export function parseCliArgs(argv: readonly string[]): CliCommand {
  const { positionals, flags } = tokenize(argv);
  const [command, ...rest] = positionals;

  if (!command || flags.get("help") === true || command === "help") {
    return { command: "help" };
  }

  switch (command) {
    case "run":
      rejectUnknown(flags, ["full", "concurrency", "rate-limit", "max-pages"]);
      return {
        command: "run",
        args: validate(runArgsSchema, {
          full: flags.get("full") === true,
          concurrency: stringFlag(flags, "concurrency"),
          rateLimitMs: stringFlag(flags, "rate-limit"),
          maxPages: stringFlag(flags, "max-pages"),
        }),
      };

    case "export":
      rejectUnknown(flags, ["out", "proximity-only", "cuisines"]);
      return {
        command: "export",
        out: stringFlag(flags, "out"),
        proximityOnly: flags.get("proximity-only") === true,
        cuisinesOut: stringFlag(flags, "cuisines"),
      };

    case "tombstone":
      rejectUnknown(flags, ["confirm", "reason"]);
      return {
        command: "tombstone",
        args: validate(tombstoneArgsSchema, {
          restaurantId: rest[0] ?? "",
          confirm: flags.get("confirm") === true,
          reason: stringFlag(flags, "reason"),
        }),
      };

    case "invalidate-location": {
      rejectUnknown(flags, []);
      const text = rest.join(" ").trim();
      if (!text) throw new CliUsageError("invalidate-location needs the location text");
      return { command: "invalidate-location", text };
    }

    case "runs": {
      rejectUnknown(flags, ["limit"]);
      const limit = validate(z.coerce.number().int().positive(), stringFlag(flags, "limit") ?? "10");
      return { command: "runs", limit };
    }

    default:
      throw new CliUsageError(`Unknown command "${command}"`);
  }
}
