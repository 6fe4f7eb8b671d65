/**
 * Tests for usage accounting
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { UsageReporter, UsageTracker } from "../../../src/lib/llm/usage";
import type { Logger } from "../../../src/lib/logger";

function recordingLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    debug: () => undefined,
    info: (msg) => {
      lines.push(msg);
    },
    warn: () => undefined,
    error: () => undefined,
  };
}

describe("UsageTracker", () => {
  it("should accumulate calls and tokens per model", () => {
    const tracker = new UsageTracker();
    tracker.record("model-a", { promptTokens: 10, completionTokens: 5, totalTokens: 15 });
    tracker.record("model-a", { promptTokens: 1, completionTokens: 2 });
    tracker.record("embed", { promptTokens: 4 });

    expect(tracker.snapshot()).toEqual([
      { model: "embed", calls: 1, promptTokens: 4, completionTokens: 0, totalTokens: 4 },
      { model: "model-a", calls: 2, promptTokens: 11, completionTokens: 7, totalTokens: 18 },
    ]);
    expect(tracker.totals()).toEqual({ calls: 3, promptTokens: 15, completionTokens: 7, totalTokens: 22 });
  });

  it("should count calls without usage data", () => {
    const tracker = new UsageTracker();
    tracker.record("model-a");
    expect(tracker.totals()).toEqual({ calls: 1, promptTokens: 0, completionTokens: 0, totalTokens: 0 });
  });

  it("should format a table with a total row", () => {
    const tracker = new UsageTracker();
    tracker.record("m", { promptTokens: 3, completionTokens: 4, totalTokens: 7 });

    const lines = tracker.formatTable().split("\n");
    expect(lines[0]).toBe("API Usage Statistics");
    expect(lines[1]).toBe("Model | API Calls | Prompt Tokens | Completion Tokens | Total Tokens");
    expect(lines[3]).toBe("m     |         1 |             3 |                 4 |            7");
    expect(lines[4]).toBe("TOTAL |         1 |             3 |                 4 |            7");
  });
});

describe("UsageReporter", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("should not start with a zero interval", () => {
    const reporter = new UsageReporter(new UsageTracker(), 0);
    reporter.start();
    expect(reporter.running).toBe(false);
  });

  it("should stop promptly and report nothing before the first interval", async () => {
    const log = recordingLogger();
    const reporter = new UsageReporter(new UsageTracker(), 60_000, log);
    reporter.start();
    expect(reporter.running).toBe(true);

    await reporter.stop();
    expect(reporter.running).toBe(false);
    expect(log.lines).toEqual([]);
  });

  it("should log the table on each interval", async () => {
    const log = recordingLogger();
    const tracker = new UsageTracker();
    tracker.record("m");
    const reporter = new UsageReporter(tracker, 5, log);
    reporter.start();

    await vi.waitFor(() => expect(log.lines.length).toBeGreaterThanOrEqual(1));
    await reporter.stop();

    expect(log.lines[0]).toContain("API Usage Statistics");
  });
});
