// =============================================================================
// Command tests
// =============================================================================
// Runs parsed commands end to end against a stubbed fetch, an in-memory
// synthesis backend, and temporary data, output, and log directories.
// `logLines` collects the console echo, which only verbose runs produce.
// =============================================================================

import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ProviderName, SynthesisBackend } from "@newsdesk/shared";
import { createAppContext, setupRun, type AppOptions, type BackendFactory } from "../app.js";
import { parseArgs } from "../cli.js";
import { describeConfig, runCommand, type CommandEnv } from "../commands/index.js";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const FEED = `<rss><channel>
  <item>
    <title>Battery plant opens</title>
    <link>https://feed.example.com/plant</link>
    <description>Production starts this week.</description>
  </item>
  <item>
    <title>Football results</title>
    <link>https://feed.example.com/football</link>
  </item>
</channel></rss>`;

const SYNTHESIS_TEXT = "## Common Themes\nBatteries are in the news.";

let root: string;
let printed: string[];
let logLines: string[];
let providers: ProviderName[];

const createBackend: BackendFactory = (provider, _config, options) => {
  providers.push(provider);
  return {
    name: provider,
    model: "test-model",
    label: `Fake-${provider}`,
    synthesize: vi.fn(async () => {
      options.onUsage?.({
        backend: `Fake-${provider}`,
        purpose: "synthesis",
        inputTokens: 10,
        outputTokens: 5,
        estimated: false,
        costUsd: 0,
        durationMs: 1,
      });
      return {
        text: SYNTHESIS_TEXT,
        usage: { inputTokens: 10, outputTokens: 5, estimated: false, costUsd: 0 },
        durationMs: 1,
      };
    }),
    cheapYesNo: vi.fn().mockResolvedValue("NO"),
  } satisfies SynthesisBackend;
};

function appOptions(env: Record<string, string> = {}, overrides: Partial<AppOptions> = {}): AppOptions {
  return {
    env: {
      OPENAI_API_KEY: "test-secret",
      GEMINI_API_KEY: "test-secret",
      DEFAULT_LLM_PROVIDER: "anthropic",
      SEMANTIC_FILTER: "false",
      DATA_DIR: join(root, "data"),
      OUTPUT_DIR: join(root, "outputs"),
      LOG_DIR: join(root, "logs"),
      ...env,
    },
    writeLog: (line) => logLines.push(line),
    fetchImpl: vi.fn(async () => new Response(FEED)),
    createBackend,
    ...overrides,
  };
}

function commandEnv(app: AppOptions, signal?: AbortSignal): CommandEnv {
  return { io: { print: (line) => printed.push(line) }, app, signal };
}

async function readLog(file: string): Promise<Record<string, unknown>[]> {
  const content = await readFile(file, "utf-8");
  return content
    .trimEnd()
    .split("\n")
    .map((line) => JSON.parse(line) as Record<string, unknown>);
}

async function run(argv: string[], app: AppOptions = appOptions(), signal?: AbortSignal) {
  return runCommand(parseArgs(argv), commandEnv(app, signal));
}

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), "newsdesk-commands-"));
  printed = [];
  logLines = [];
  providers = [];
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// Wiring
// ---------------------------------------------------------------------------

describe("setupRun", () => {
  it("substitutes the first configured fallback and logs it", async () => {
    const context = createAppContext(appOptions());
    const { selection, backend } = setupRun(context);

    expect(selection).toEqual({ requested: "anthropic", provider: "openai", substituted: true });
    expect(backend.name).toBe("openai");
    const warning = (await readLog(context.logFile)).find(
      (entry) => entry.msg === "Requested provider unavailable, using fallback",
    );
    expect(warning).toMatchObject({ level: "warn", requested: "anthropic", provider: "openai" });
  });

  it("honours an explicit provider choice", () => {
    const { backend } = setupRun(createAppContext(appOptions()), { provider: "gemini" });
    expect(backend.name).toBe("gemini");
  });
});

// ---------------------------------------------------------------------------
// analyze
// ---------------------------------------------------------------------------

describe("analyze", () => {
  it("runs the pipeline, stores the analysis and writes a report", async () => {
    const code = await run(["analyze", "battery", "-s", "https://feed.example.com/rss"]);

    expect(code).toBe(0);
    expect(providers).toEqual(["openai"]);
    expect(printed).toContain("Analysis complete.");
    expect(printed).toContain(SYNTHESIS_TEXT);
    expect(printed).toContain("Articles processed: 1");
    expect(await readdir(join(root, "outputs"))).toHaveLength(1);
    const logFiles = (await readdir(join(root, "logs"))).sort();
    expect(logFiles).toHaveLength(2);
    expect(logFiles[0]).toMatch(/^metrics_\d{8}_\d{6}\.json$/);
    expect(logFiles[1]).toMatch(/^session_\d{8}_\d{6}\.log$/);
    expect(await readdir(join(root, "data", "syntheses"))).toHaveLength(1);
  });

  it("logs to the session file and keeps the console quiet", async () => {
    const context = createAppContext(appOptions({}, { now: () => new Date(2024, 4, 6, 7, 8, 9) }));
    setupRun(context);

    expect(context.logFile).toBe(join(root, "logs", "session_20240506_070809.log"));
    expect((await readLog(context.logFile)).map((entry) => entry.msg)).toEqual([
      "Requested provider unavailable, using fallback",
      "Pipeline configured",
    ]);
    expect(logLines).toEqual([]);
  });

  it("echoes log lines to the console with --verbose", async () => {
    const code = await run(["analyze", "battery", "-s", "https://feed.example.com/rss", "-v"]);

    expect(code).toBe(0);
    const [sessionLog] = (await readdir(join(root, "logs"))).filter((name) =>
      name.startsWith("session_"),
    );
    const fileLines = (await readFile(join(root, "logs", sessionLog ?? ""), "utf-8"))
      .trimEnd()
      .split("\n");
    expect(logLines.length).toBeGreaterThan(0);
    expect(logLines.map((line) => line.trimEnd())).toEqual(fileLines);
  });

  it("skips storage and output on request", async () => {
    const code = await run([
      "analyze",
      "battery",
      "-s",
      "https://feed.example.com/rss",
      "--no-storage",
      "--no-output",
    ]);

    expect(code).toBe(0);
    await expect(readdir(join(root, "outputs"))).rejects.toThrow();
    await expect(readdir(join(root, "data"))).rejects.toThrow();
  });

  it("exits 1 when every source fails", async () => {
    const app = appOptions({}, { fetchImpl: vi.fn(async () => new Response("", { status: 503 })) });
    const code = await run(["analyze", "battery", "-s", "https://feed.example.com/rss"], app);

    expect(code).toBe(1);
    expect(printed).toContain(
      "Analysis failed: No items fetched from any source. Failed sources: https://feed.example.com/rss",
    );
    expect(printed).toContain(
      "  - [fetch https://feed.example.com/rss] Failed to fetch from https://feed.example.com/rss: HTTP 503",
    );
  });

  it("exits 130 when interrupted", async () => {
    const controller = new AbortController();
    controller.abort();
    const code = await run(
      ["analyze", "battery", "-s", "https://feed.example.com/rss"],
      appOptions(),
      controller.signal,
    );

    expect(code).toBe(130);
    expect(printed).toContain("Interrupted by user");
  });

  it("refuses to run without any API key", async () => {
    const app = appOptions({ OPENAI_API_KEY: "", GEMINI_API_KEY: "" });
    const code = await run(["analyze", "battery"], app);

    expect(code).toBe(1);
    expect(printed[0]).toBe("Configuration errors:");
    expect(providers).toEqual([]);
  });

  it("reports invalid configuration as an error", async () => {
    const code = await run(["analyze", "battery"], appOptions({ MAX_TOKENS: "-5" }));
    expect(code).toBe(1);
    expect(printed[0]?.startsWith("Error: Configuration error (MAX_TOKENS):")).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// history / show
// ---------------------------------------------------------------------------

describe("history and show", () => {
  it("lists nothing before the first analysis", async () => {
    expect(await run(["history"])).toBe(0);
    expect(printed).toContain("No analyses found");
  });

  it("shows a stored analysis by identifier", async () => {
    await run(["analyze", "battery", "-s", "https://feed.example.com/rss", "--no-output"]);
    const [file] = await readdir(join(root, "data", "syntheses"));
    const identifier = file?.replace(/\.json$/, "") ?? "";

    printed = [];
    expect(await run(["history", "-n", "5"])).toBe(0);
    expect(printed).toContain(identifier);
    expect(printed).toContain("  Topic:    battery");

    printed = [];
    expect(await run(["show", identifier])).toBe(0);
    expect(printed).toContain("Topic:    battery");
    expect(printed).toContain("Articles: 1");
    expect(printed).toContain(SYNTHESIS_TEXT);
  });

  it("exits 1 for an unknown identifier", async () => {
    expect(await run(["show", "19990101_000000"])).toBe(1);
    expect(printed).toEqual([
      "Error: Storage load failed: Synthesis file not found: 19990101_000000",
    ]);
  });
});

// ---------------------------------------------------------------------------
// sources / config / test / help
// ---------------------------------------------------------------------------

describe("other commands", () => {
  it("lists the sources of a category", async () => {
    expect(await run(["sources", "-c", "tech"])).toBe(0);
    expect(printed).toContain("Total: 3 sources");
  });

  it("never prints credential values", () => {
    const lines = describeConfig(createAppContext(appOptions()).config);
    expect(lines).toContain("  ANTHROPIC_API_KEY: NOT SET");
    expect(lines).toContain("  OPENAI_API_KEY:    Set");
    expect(lines.some((line) => line.includes("test-secret"))).toBe(false);
  });

  it("self-tests against the first default source", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response(FEED));
    const code = await run(["test"], appOptions({}, { fetchImpl }));

    expect(code).toBe(0);
    expect(printed).toContain("All components working");
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl.mock.calls[0]?.[0]).toBe("https://www.err.ee/rss");
  });

  it("prints usage for help", async () => {
    expect(await run(["help"])).toBe(0);
    expect(printed[0]).toBe("Usage: newsdesk <command> [options]");
  });
});
