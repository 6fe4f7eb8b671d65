/**
 * Token usage accounting
 * Per-model counters for one run, plus a cancellable periodic reporter
 */

import { setTimeout as sleep } from "timers/promises";
import { type Logger, createLogger, errorMessage } from "../logger";

export interface ModelUsage {
  calls: number;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface TokenCounts {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
}

function emptyUsage(): ModelUsage {
  return { calls: 0, promptTokens: 0, completionTokens: 0, totalTokens: 0 };
}

export class UsageTracker {
  private readonly byModel = new Map<string, ModelUsage>();

  /**
   * Count one successful call and add whatever token counts the provider reported
   */
  record(model: string, tokens: TokenCounts = {}): void {
    const usage = this.byModel.get(model) ?? emptyUsage();
    usage.calls += 1;
    usage.promptTokens += tokens.promptTokens ?? 0;
    usage.completionTokens += tokens.completionTokens ?? 0;
    usage.totalTokens +=
      tokens.totalTokens ?? (tokens.promptTokens ?? 0) + (tokens.completionTokens ?? 0);
    this.byModel.set(model, usage);
  }

  /**
   * Models sorted alphabetically with a copy of their counters
   */
  snapshot(): Array<{ model: string } & ModelUsage> {
    return [...this.byModel.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([model, usage]) => ({ model, ...usage }));
  }

  totals(): ModelUsage {
    const total = emptyUsage();
    for (const usage of this.byModel.values()) {
      total.calls += usage.calls;
      total.promptTokens += usage.promptTokens;
      total.completionTokens += usage.completionTokens;
      total.totalTokens += usage.totalTokens;
    }
    return total;
  }

  formatTable(): string {
    const header = ["Model", "API Calls", "Prompt Tokens", "Completion Tokens", "Total Tokens"];
    const rows = this.snapshot().map((row) => [
      row.model,
      String(row.calls),
      String(row.promptTokens),
      String(row.completionTokens),
      String(row.totalTokens),
    ]);
    const total = this.totals();
    rows.push([
      "TOTAL",
      String(total.calls),
      String(total.promptTokens),
      String(total.completionTokens),
      String(total.totalTokens),
    ]);

    const widths = header.map((title, col) =>
      Math.max(title.length, ...rows.map((row) => row[col].length))
    );
    const line = (cells: string[]) =>
      cells.map((cell, col) => (col === 0 ? cell.padEnd(widths[col]) : cell.padStart(widths[col]))).join(" | ");
    const separator = widths.map((w) => "-".repeat(w)).join("-+-");

    return ["API Usage Statistics", line(header), separator, ...rows.map(line)].join("\n");
  }
}

/**
 * Logs the usage table every `intervalMs` until stopped.
 * `stop()` cancels the pending wait and resolves once the loop has exited.
 */
export class UsageReporter {
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(
    private readonly tracker: UsageTracker,
    private readonly intervalMs: number,
    private readonly log: Logger = createLogger("usage")
  ) {}

  get running(): boolean {
    return this.loop !== null;
  }

  start(): void {
    if (this.loop || this.intervalMs <= 0) return;
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);
  }

  async stop(): Promise<void> {
    if (!this.loop || !this.controller) return;
    this.controller.abort();
    await this.loop;
    this.loop = null;
    this.controller = null;
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await sleep(this.intervalMs, undefined, { signal });
      } catch (error) {
        if (signal.aborted) return;
        this.log.warn("Usage reporter wait failed", { error: errorMessage(error) });
        return;
      }
      this.log.info(`\n${this.tracker.formatTable()}`);
    }
  }
}
