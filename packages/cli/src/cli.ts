// =============================================================================
// @newsdesk/cli — Argument parsing
// =============================================================================
// Turns argv into a typed command. Unknown flags and missing values are
// usage errors; nothing here touches config or the filesystem.
// =============================================================================

import {
  AggregatorError,
  isSourceCategory,
  providerNameSchema,
  SOURCE_CATEGORIES,
  type ProviderName,
} from "@newsdesk/shared";

export type Command =
  | {
      name: "analyze";
      topic: string;
      sources: string[];
      category?: string;
      provider?: ProviderName;
      storage: boolean;
      output: boolean;
      verbose: boolean;
    }
  | { name: "sources"; category: string }
  | { name: "history"; limit: number }
  | { name: "show"; identifier: string }
  | { name: "test"; verbose: boolean }
  | { name: "config" }
  | { name: "help" };

export const DEFAULT_HISTORY_LIMIT = 10;

export class UsageError extends AggregatorError {
  constructor(message: string) {
    super(message, "USAGE_ERROR");
    this.name = "UsageError";
  }
}

export const USAGE = `Usage: newsdesk <command> [options]

Commands:
  analyze <topic>     Fetch, filter and synthesize news on a topic
    -s, --source URL      Feed URL (repeatable)
    -c, --category NAME   Source category: ${SOURCE_CATEGORIES.join(", ")}
    -p, --provider NAME   Backend: anthropic, openai, gemini
        --no-storage      Skip saving the analysis
        --no-output       Skip the markdown report
    -v, --verbose         Debug logging
  sources             List feed sources
    -c, --category NAME   Category to list (default: all)
  history             Show recent analyses
    -n, --limit N         Entries to show (default: ${DEFAULT_HISTORY_LIMIT})
  show <identifier>   Show a stored analysis
  test                Run a one-source self-test
  config              Show the current configuration
  help                Show this message
`;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

class ArgReader {
  private index = 0;

  constructor(private readonly args: readonly string[]) {}

  next(): string | undefined {
    return this.args[this.index++];
  }

  value(flag: string): string {
    const value = this.next();
    if (value === undefined || value.startsWith("-")) {
      throw new UsageError(`Option ${flag} requires a value`);
    }
    return value;
  }
}

function parseCategory(value: string): string {
  if (!isSourceCategory(value)) {
    throw new UsageError(
      `Unknown category "${value}". Expected one of: ${SOURCE_CATEGORIES.join(", ")}`,
    );
  }
  return value;
}

function parseProvider(value: string): ProviderName {
  const parsed = providerNameSchema.safeParse(value);
  if (!parsed.success) {
    throw new UsageError(
      `Unknown provider "${value}". Expected one of: ${providerNameSchema.options.join(", ")}`,
    );
  }
  return parsed.data;
}

function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new UsageError(`Limit must be a positive integer, got "${value}"`);
  }
  return limit;
}

function unknownOption(arg: string): never {
  throw new UsageError(`Unknown option: ${arg}`);
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

function parseAnalyze(reader: ArgReader): Command {
  const positional: string[] = [];
  const sources: string[] = [];
  let category: string | undefined;
  let provider: ProviderName | undefined;
  let storage = true;
  let output = true;
  let verbose = false;

  for (let arg = reader.next(); arg !== undefined; arg = reader.next()) {
    switch (arg) {
      case "-s":
      case "--source":
        sources.push(reader.value(arg));
        break;
      case "-c":
      case "--category":
        category = parseCategory(reader.value(arg));
        break;
      case "-p":
      case "--provider":
        provider = parseProvider(reader.value(arg));
        break;
      case "--no-storage":
        storage = false;
        break;
      case "--no-output":
        output = false;
        break;
      case "-v":
      case "--verbose":
        verbose = true;
        break;
      default:
        if (arg.startsWith("-")) unknownOption(arg);
        positional.push(arg);
    }
  }

  const topic = positional.join(" ").trim();
  if (topic === "") {
    throw new UsageError("analyze requires a topic, e.g. analyze \"AI regulation\"");
  }

  return { name: "analyze", topic, sources, category, provider, storage, output, verbose };
}

export function parseArgs(argv: readonly string[]): Command {
  const reader = new ArgReader(argv);
  const name = reader.next();

  switch (name) {
    case undefined:
    case "help":
    case "-h":
    case "--help":
      return { name: "help" };

    case "analyze":
      return parseAnalyze(reader);

    case "sources": {
      let category = "all";
      for (let arg = reader.next(); arg !== undefined; arg = reader.next()) {
        if (arg === "-c" || arg === "--category") {
          category = parseCategory(reader.value(arg));
        } else {
          unknownOption(arg);
        }
      }
      return { name: "sources", category };
    }

    case "history": {
      let limit = DEFAULT_HISTORY_LIMIT;
      for (let arg = reader.next(); arg !== undefined; arg = reader.next()) {
        if (arg === "-n" || arg === "--limit") {
          limit = parseLimit(reader.value(arg));
        } else {
          unknownOption(arg);
        }
      }
      return { name: "history", limit };
    }

    case "show": {
      const identifier = reader.next();
      if (identifier === undefined || identifier.startsWith("-")) {
        throw new UsageError("show requires an analysis identifier");
      }
      const extra = reader.next();
      if (extra !== undefined) unknownOption(extra);
      return { name: "show", identifier };
    }

    case "test": {
      let verbose = false;
      for (let arg = reader.next(); arg !== undefined; arg = reader.next()) {
        if (arg === "-v" || arg === "--verbose") verbose = true;
        else unknownOption(arg);
      }
      return { name: "test", verbose };
    }

    case "config": {
      const extra = reader.next();
      if (extra !== undefined) unknownOption(extra);
      return { name: "config" };
    }

    default:
      throw new UsageError(`Unknown command: ${name}`);
  }
}
