// src/replicate.ts
import { NanoClusterClient, type ClusterClient } from "./cluster-client.js";
import { ClusterEndpoint } from "./endpoint.js";
import { runJobs, validateConcurrency } from "./job-scheduler.js";
import { NullLogger, type Logger } from "./logger.js";
import { ProgressReporter } from "./progress.js";
import { ReplicationJob } from "./replication-job.js";
import type { RunSummary } from "./run-summary.js";
import { buildSelectionPolicy, selectDatabases } from "./selection.js";
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_MAX_RETRIES,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_RETRY_DELAY_MS,
} from "./constants.js";

export type ReplicateOptions = {
  source: string;
  target: string;
  databases: string[];
  all: boolean;
  skip: string[];
  concurrency: number;
  useTarget: boolean;
  systemDbs: boolean;
  permanent: boolean;
  createTarget: boolean;
  quiet: boolean;
  requestTimeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  logger?: Logger;
};

export const DEFAULT_REPLICATE_OPTIONS: Omit<
  ReplicateOptions,
  "source" | "target" | "databases" | "all" | "logger"
> = {
  skip: [],
  concurrency: DEFAULT_CONCURRENCY,
  useTarget: false,
  systemDbs: false,
  permanent: false,
  createTarget: true,
  quiet: false,
  requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
  maxRetries: DEFAULT_MAX_RETRIES,
  retryDelayMs: DEFAULT_RETRY_DELAY_MS,
};

export type ReplicateDeps = {
  createClient?: (endpoint: ClusterEndpoint) => ClusterClient;
  reporter?: ProgressReporter;
  stopSignal?: AbortSignal;
  abandonSignal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
};

/**
 * One full run. Everything that can be rejected without talking to a
 * cluster is validated first; discovery and empty-selection errors
 * propagate, per-database failures end up in the returned summary.
 */
export async function runReplicate(
  options: ReplicateOptions,
  deps: ReplicateDeps = {},
): Promise<RunSummary> {
  const logger = options.logger ?? new NullLogger();
  const concurrency = validateConcurrency(options.concurrency);
  const policy = buildSelectionPolicy({
    databases: options.databases,
    all: options.all,
    skip: options.skip,
    systemDbs: options.systemDbs,
  });
  const sourceEndpoint = ClusterEndpoint.parse(options.source, "source");
  const targetEndpoint = ClusterEndpoint.parse(options.target, "target");

  const createClient =
    deps.createClient ??
    ((endpoint: ClusterEndpoint) =>
      new NanoClusterClient(endpoint, {
        timeoutMs: options.requestTimeoutMs,
        logger,
      }));
  const source = createClient(sourceEndpoint);
  const target = createClient(targetEndpoint);

  const selection = await selectDatabases(policy, source, logger);
  logger.info("replicating databases", {
    selected: selection.databases.length,
    skipped: selection.skipped.length,
    concurrency,
    via: options.useTarget ? "target" : "source",
  });

  const reporter = deps.reporter ?? new ProgressReporter({ quiet: options.quiet });
  reporter.start(selection.databases.length);

  const summary = await runJobs(selection.databases, {
    concurrency,
    skipped: selection.skipped,
    stopSignal: deps.stopSignal,
    abandonSignal: deps.abandonSignal,
    logger,
    createJob: (database) =>
      new ReplicationJob({
        database,
        source,
        target,
        useTarget: options.useTarget,
        permanent: options.permanent,
        createTarget: options.createTarget,
        maxRetries: options.maxRetries,
        retryDelayMs: options.retryDelayMs,
        sleep: deps.sleep,
        logger,
      }),
    onResult: (_result, live) => reporter.update(live),
  });

  reporter.finish(summary);
  return summary;
}
