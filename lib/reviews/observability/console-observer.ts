/**
 * Console Observer
 * 
 * Default observer implementation that logs structured JSON
 * to console for easy parsing in hosted log systems.
 */

import type { ReviewIngestionObserver, ObserverMetrics } from "./types";

export type LineWriter = (line: string) => void;

export class ConsoleObserver implements ReviewIngestionObserver {
  private metrics: ObserverMetrics = {
    counters: {},
    timings: {},
    steps: [],
  };

  constructor(
    private readonly write: LineWriter = (line) => console.log(line),
    private readonly options: { logSteps?: boolean } = {}
  ) {}

  onRunStart(meta: { runId: string; sourceKey: string; input: unknown }): void {
    this.emit({
      event: "review_ingestion_run_start",
      runId: meta.runId,
      sourceKey: meta.sourceKey,
      input: meta.input,
    });
  }

  onStepStart(meta: { runId: string; step: string; url?: string }): void {
    if (!this.options.logSteps) return;
    this.emit({
      event: "review_ingestion_step_start",
      runId: meta.runId,
      step: meta.step,
      url: meta.url,
    });
  }

  onStepEnd(meta: {
    runId: string;
    step: string;
    url?: string;
    ok: boolean;
    durationMs: number;
    data?: unknown;
  }): void {
    this.metrics.steps.push({
      step: meta.step,
      url: meta.url,
      ok: meta.ok,
      durationMs: meta.durationMs,
    });

    // Failed steps are always logged; successful ones only in verbose mode
    if (meta.ok && !this.options.logSteps) return;
    this.emit({
      event: "review_ingestion_step_end",
      runId: meta.runId,
      step: meta.step,
      url: meta.url,
      ok: meta.ok,
      durationMs: meta.durationMs,
      data: meta.data,
    });
  }

  onRunEnd(meta: {
    runId: string;
    ok: boolean;
    durationMs: number;
    error?: string;
    summary?: unknown;
  }): void {
    this.emit({
      event: "review_ingestion_run_end",
      runId: meta.runId,
      ok: meta.ok,
      durationMs: meta.durationMs,
      error: meta.error,
      summary: meta.summary,
      metrics: this.metrics,
    });
  }

  increment(name: string, by = 1, tags?: Record<string, string>): void {
    const key = tags ? `${name}:${JSON.stringify(tags)}` : name;
    this.metrics.counters[key] = (this.metrics.counters[key] || 0) + by;
  }

  timing(name: string, durationMs: number, tags?: Record<string, string>): void {
    const key = tags ? `${name}:${JSON.stringify(tags)}` : name;
    if (!this.metrics.timings[key]) {
      this.metrics.timings[key] = [];
    }
    this.metrics.timings[key].push(durationMs);
  }

  getMetrics(): ObserverMetrics {
    return { ...this.metrics };
  }

  private emit(payload: Record<string, unknown>): void {
    this.write(JSON.stringify({ ...payload, timestamp: new Date().toISOString() }));
  }
}

/**
 * Create a new console observer instance.
 */
export function createConsoleObserver(options: { logSteps?: boolean } = {}): ConsoleObserver {
  return new ConsoleObserver(undefined, options);
}

/**
 * Observer that records metrics but writes nothing. Used by tests.
 */
export function createSilentObserver(): ConsoleObserver {
  return new ConsoleObserver(() => {});
}
