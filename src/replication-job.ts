// src/replication-job.ts
import type {
  ClusterClient,
  ReplicationOutcome,
  ReplicationRequest,
} from "./cluster-client.js";
import {
  CancelledError,
  TransientError,
  describeError,
} from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";
import type { JobResult } from "./run-summary.js";
import { DEFAULT_MAX_RETRIES, DEFAULT_RETRY_DELAY_MS } from "./constants.js";
import { wait } from "./util.js";

export type JobState =
  | "pending"
  | "replicating"
  | "succeeded"
  | "failed"
  | "continuous-established";

export interface Job {
  readonly database: string;
  run(signal?: AbortSignal): Promise<JobResult>;
}

export type JobFactory = (database: string) => Job;

export type ReplicationJobOptions = {
  database: string;
  source: ClusterClient;
  target: ClusterClient;
  // issue _replicate through the target cluster instead of the source
  useTarget?: boolean;
  // add a continuous replication once the one-shot pass succeeded
  permanent?: boolean;
  createTarget?: boolean;
  maxRetries?: number;
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => number;
  logger?: Logger;
  onStateChange?: (state: JobState, job: ReplicationJob) => void;
};

export class ReplicationJob implements Job {
  readonly database: string;
  private _state: JobState = "pending";
  private attempts = 0;
  private readonly opts: ReplicationJobOptions;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly clock: () => number;

  constructor(opts: ReplicationJobOptions) {
    this.opts = opts;
    this.database = opts.database;
    this.logger = (opts.logger ?? new NullLogger()).child("job");
    this.sleep = opts.sleep ?? wait;
    this.clock = opts.clock ?? Date.now;
  }

  get state(): JobState {
    return this._state;
  }

  get issuer(): ClusterClient {
    return this.opts.useTarget ? this.opts.target : this.opts.source;
  }

  buildRequest(continuous: boolean): ReplicationRequest {
    const request: ReplicationRequest = {
      source: this.opts.source.endpoint,
      target: this.opts.target.endpoint,
      database: this.database,
      continuous,
      createTarget: this.opts.createTarget ?? true,
      direction: this.opts.useTarget ? "target" : "source",
    };
    return Object.freeze(request);
  }

  async run(signal?: AbortSignal): Promise<JobResult> {
    if (this._state !== "pending") {
      throw new Error(`replication job for ${this.database} already started`);
    }
    const startedAt = this.clock();
    this.transition("replicating");
    this.logger.info(`starting replication of database ${this.database}`, {
      via: this.issuer.endpoint.redacted,
    });

    let outcome: ReplicationOutcome;
    try {
      outcome = await this.replicateWithRetry(this.buildRequest(false), signal);
    } catch (err) {
      this.transition("failed");
      const error = describeError(err);
      this.logger.error(`failed to replicate database ${this.database}`, {
        kind: error.kind,
        error: error.message,
      });
      return {
        database: this.database,
        outcome: "failed",
        error,
        continuous: "not-requested",
        attempts: this.attempts,
        elapsedMs: this.clock() - startedAt,
      };
    }

    this.transition("succeeded");
    this.logger.info(`replication of database ${this.database} successful`);
    const result: JobResult = {
      database: this.database,
      outcome: "succeeded",
      continuous: "not-requested",
      attempts: this.attempts,
      elapsedMs: 0,
    };
    if (outcome.docsWritten !== undefined) {
      result.docsWritten = outcome.docsWritten;
    }

    if (this.opts.permanent) {
      this.logger.info(
        `setting up continuous replication of database ${this.database}`,
      );
      try {
        await this.replicateWithRetry(this.buildRequest(true), signal);
        this.transition("continuous-established");
        result.continuous = "established";
        this.logger.info(
          `continuous replication of database ${this.database} set up`,
        );
      } catch (err) {
        result.continuous = "failed";
        result.continuousError = describeError(err);
        this.logger.warn(
          `failed to set up continuous replication of database ${this.database}`,
          { error: result.continuousError.message },
        );
      }
      result.attempts = this.attempts;
    }

    result.elapsedMs = this.clock() - startedAt;
    return result;
  }

  private async replicateWithRetry(
    request: ReplicationRequest,
    signal?: AbortSignal,
  ): Promise<ReplicationOutcome> {
    const maxRetries = Math.max(0, this.opts.maxRetries ?? DEFAULT_MAX_RETRIES);
    const baseDelay = this.opts.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    for (let retry = 0; ; retry++) {
      if (signal?.aborted) {
        throw new CancelledError(`replication of ${this.database} abandoned`);
      }
      this.attempts += 1;
      try {
        return await this.issuer.replicate(request);
      } catch (err) {
        if (!(err instanceof TransientError) || retry >= maxRetries) {
          throw err;
        }
        const delay = baseDelay * 2 ** retry;
        this.logger.warn(`transient error replicating ${this.database}, retrying`, {
          error: err.message,
          retry: retry + 1,
          delayMs: delay,
        });
        await this.sleep(delay);
      }
    }
  }

  private transition(next: JobState) {
    this._state = next;
    this.opts.onStateChange?.(next, this);
  }
}
