// src/run-summary.ts
import type { JobErrorDetail } from "./errors.js";
import type { SkippedDatabase } from "./selection.js";

export type JobOutcome = "succeeded" | "failed";
export type ContinuousStatus = "not-requested" | "established" | "failed";

export type JobResult = {
  database: string;
  outcome: JobOutcome;
  error?: JobErrorDetail;
  // annotation only; never turns a succeeded job into a failure
  continuous: ContinuousStatus;
  continuousError?: JobErrorDetail;
  attempts: number;
  elapsedMs: number;
  docsWritten?: number;
};

/**
 * Aggregate of one run. Results are recorded as jobs finish so the counters
 * are live; the exit code is only meaningful once finalized.
 */
export class RunSummary {
  readonly total: number;
  readonly skipped: readonly SkippedDatabase[];
  readonly startedAt: number;
  private finishedAt?: number;
  private readonly order: readonly string[];
  private readonly byDatabase = new Map<string, JobResult>();
  private readonly clock: () => number;

  constructor(
    databases: readonly string[],
    {
      skipped = [],
      clock = Date.now,
    }: { skipped?: readonly SkippedDatabase[]; clock?: () => number } = {},
  ) {
    this.order = [...databases];
    this.total = databases.length;
    this.skipped = skipped;
    this.clock = clock;
    this.startedAt = clock();
  }

  record(result: JobResult): void {
    if (this.finishedAt !== undefined) {
      throw new Error(`run summary already finalized (${result.database})`);
    }
    if (!this.order.includes(result.database)) {
      throw new Error(`database ${result.database} was not selected`);
    }
    if (this.byDatabase.has(result.database)) {
      throw new Error(`database ${result.database} already has a result`);
    }
    this.byDatabase.set(result.database, result);
  }

  has(database: string): boolean {
    return this.byDatabase.has(database);
  }

  get completed(): number {
    return this.byDatabase.size;
  }

  get succeeded(): number {
    return this.count((r) => r.outcome === "succeeded");
  }

  get failed(): number {
    return this.count((r) => r.outcome === "failed");
  }

  get skippedCount(): number {
    return this.skipped.length;
  }

  get continuousEstablished(): number {
    return this.count((r) => r.continuous === "established");
  }

  get continuousFailed(): number {
    return this.count((r) => r.continuous === "failed");
  }

  get isFinal(): boolean {
    return this.finishedAt !== undefined;
  }

  get elapsedMs(): number {
    return (this.finishedAt ?? this.clock()) - this.startedAt;
  }

  results(): JobResult[] {
    const out: JobResult[] = [];
    for (const name of this.order) {
      const result = this.byDatabase.get(name);
      if (result) out.push(result);
    }
    return out;
  }

  failures(): JobResult[] {
    return this.results().filter((r) => r.outcome === "failed");
  }

  continuousFailures(): JobResult[] {
    return this.results().filter((r) => r.continuous === "failed");
  }

  finalize(): this {
    if (this.finishedAt !== undefined) return this;
    if (this.completed < this.total) {
      throw new Error(
        `cannot finalize run summary: ${this.total - this.completed} databases have no result`,
      );
    }
    this.finishedAt = this.clock();
    return this;
  }

  get exitCode(): 0 | 1 {
    return this.isFinal && this.failed === 0 ? 0 : 1;
  }

  private count(pred: (result: JobResult) => boolean): number {
    let n = 0;
    for (const result of this.byDatabase.values()) {
      if (pred(result)) n += 1;
    }
    return n;
  }
}
