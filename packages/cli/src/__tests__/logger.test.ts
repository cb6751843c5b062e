import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { createFileWriter, createLogger, logExternalCall, teeWriter } from "../logger.js";

function capture(level: string) {
  const lines: string[] = [];
  const logger = createLogger({ level, write: (line) => lines.push(line) });
  const entries = () => lines.map((line) => JSON.parse(line) as Record<string, unknown>);
  return { logger, entries };
}

describe("createLogger", () => {
  it("writes one JSON line per entry above the threshold", () => {
    const { logger, entries } = capture("warn");
    logger.info("hidden");
    logger.warn("shown", { source: "a" });

    expect(entries()).toHaveLength(1);
    expect(entries()[0]).toMatchObject({ level: "warn", msg: "shown", source: "a" });
  });

  it("falls back to info for unknown levels", () => {
    const { logger, entries } = capture("chatty");
    logger.debug("hidden");
    logger.info("shown");
    expect(entries().map((entry) => entry.msg)).toEqual(["shown"]);
  });

  it("merges child bindings into every entry", () => {
    const { logger, entries } = capture("debug");
    logger.child({ runId: "run-1" }).child({ component: "fetcher" }).debug("parsed");
    expect(entries()[0]).toMatchObject({ runId: "run-1", component: "fetcher", msg: "parsed" });
  });
});

describe("logExternalCall", () => {
  it("logs completions at info and failures at error", () => {
    const { logger, entries } = capture("info");
    logExternalCall(logger, "feed", "https://example.com/rss", 12.6);
    logExternalCall(logger, "feed", "https://example.com/rss", 3, "HTTP 500");

    expect(entries()).toMatchObject([
      { level: "info", msg: "External call completed", service: "feed", durationMs: 13 },
      { level: "error", msg: "External call failed", error: "HTTP 500", durationMs: 3 },
    ]);
  });
});

describe("line writers", () => {
  it("appends to a file in a directory created on first write", async () => {
    const root = await mkdtemp(join(tmpdir(), "newsdesk-logger-"));
    try {
      const file = join(root, "logs", "session_20240506_070809.log");
      const write = createFileWriter(file);
      write("one\n");
      write("two\n");
      expect(await readFile(file, "utf-8")).toBe("one\ntwo\n");
    } finally {
      await rm(root, { recursive: true, force: true });
    }
  });

  it("tees every line to each writer in order", () => {
    const first: string[] = [];
    const second: string[] = [];
    const logger = createLogger({
      write: teeWriter(
        (line) => first.push(line),
        (line) => second.push(line),
      ),
    });
    logger.info("both");
    expect(first).toHaveLength(1);
    expect(second).toEqual(first);
  });
});
