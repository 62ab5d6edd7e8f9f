// src/job-scheduler.ts
import { ConfigError, describeError } from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";
import type { Job, JobFactory } from "./replication-job.js";
import { RunSummary, type JobResult } from "./run-summary.js";
import type { SkippedDatabase } from "./selection.js";

export type SchedulerOptions = {
  concurrency: number;
  createJob: JobFactory;
  skipped?: readonly SkippedDatabase[];
  // stop dispatching; active jobs run to completion
  stopSignal?: AbortSignal;
  // stop waiting for active jobs too; they are recorded as cancelled
  abandonSignal?: AbortSignal;
  onDispatch?: (database: string, active: number) => void;
  onResult?: (result: JobResult, summary: RunSummary) => void;
  logger?: Logger;
  clock?: () => number;
};

export function validateConcurrency(value: unknown): number {
  const n = typeof value === "string" ? Number(value.trim()) : value;
  if (typeof n !== "number" || !Number.isInteger(n) || n < 1) {
    throw new ConfigError(
      `concurrency must be a positive integer, got ${String(value)}`,
    );
  }
  return n;
}

function failedResult(database: string, err: unknown): JobResult {
  return {
    database,
    outcome: "failed",
    error: describeError(err),
    continuous: "not-requested",
    attempts: 0,
    elapsedMs: 0,
  };
}

export function cancelledResult(database: string, message: string): JobResult {
  return {
    database,
    outcome: "failed",
    error: { kind: "cancelled", message },
    continuous: "not-requested",
    attempts: 0,
    elapsedMs: 0,
  };
}

function runJob(job: Job, abandonSignal?: AbortSignal): Promise<JobResult> {
  const running = job
    .run(abandonSignal)
    .catch((err: unknown) => failedResult(job.database, err));
  if (!abandonSignal) return running;
  return new Promise<JobResult>((resolve) => {
    const onAbort = () =>
      resolve(
        cancelledResult(job.database, "abandoned while replicating"),
      );
    if (abandonSignal.aborted) {
      onAbort();
      return;
    }
    abandonSignal.addEventListener("abort", onAbort, { once: true });
    void running.then((result) => {
      abandonSignal.removeEventListener("abort", onAbort);
      resolve(result);
    });
  });
}

/**
 * Run one job per database with at most `concurrency` in flight. Databases
 * are dispatched in the given order; a failed job never stops the others.
 * Every database ends up with exactly one result in the returned summary.
 */
export async function runJobs(
  databases: readonly string[],
  {
    concurrency,
    createJob,
    skipped,
    stopSignal,
    abandonSignal,
    onDispatch,
    onResult,
    logger = new NullLogger(),
    clock,
  }: SchedulerOptions,
): Promise<RunSummary> {
  const limit = validateConcurrency(concurrency);
  const summary = new RunSummary(databases, { skipped, clock });
  const queue = [...databases];
  let next = 0;
  let active = 0;

  const interrupted = () =>
    stopSignal?.aborted === true || abandonSignal?.aborted === true;

  const record = (result: JobResult) => {
    summary.record(result);
    onResult?.(result, summary);
  };

  const dispatch = (database: string): Promise<JobResult> => {
    let job: Job;
    try {
      job = createJob(database);
    } catch (err) {
      return Promise.resolve(failedResult(database, err));
    }
    return runJob(job, abandonSignal);
  };

  const worker = async () => {
    while (next < queue.length && !interrupted()) {
      const database = queue[next++];
      active += 1;
      logger.debug("dispatch", { database, active });
      onDispatch?.(database, active);
      try {
        record(await dispatch(database));
      } finally {
        active -= 1;
      }
    }
  };

  const lanes = Math.min(limit, queue.length);
  await Promise.all(Array.from({ length: lanes }, () => worker()));

  if (next < queue.length) {
    logger.warn("run interrupted; remaining databases not replicated", {
      remaining: queue.length - next,
    });
    for (const database of queue.slice(next)) {
      record(cancelledResult(database, "not started: run interrupted"));
    }
  }
  return summary.finalize();
}
