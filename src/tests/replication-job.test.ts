import { ReplicationJob, type JobState } from "../replication-job.js";
import {
  ConflictError,
  NotFoundError,
  TransientError,
} from "../errors.js";
import { StructuredLogger, type LogEntry } from "../logger.js";
import { FakeClusterClient, endpoint } from "./fake-cluster.js";

const noSleep = async () => {};

function clusters(
  behavior?: ConstructorParameters<typeof FakeClusterClient>[1],
) {
  return {
    source: new FakeClusterClient(endpoint("source", "alpha"), behavior),
    target: new FakeClusterClient(endpoint("target", "beta"), behavior),
  };
}

describe("ReplicationJob", () => {
  it("runs a one-shot replication through the source by default", async () => {
    const { source, target } = clusters();
    const states: JobState[] = [];
    const job = new ReplicationJob({
      database: "orders",
      source,
      target,
      onStateChange: (state) => states.push(state),
    });
    expect(job.state).toBe("pending");
    const result = await job.run();
    expect(result).toMatchObject({
      database: "orders",
      outcome: "succeeded",
      continuous: "not-requested",
      attempts: 1,
    });
    expect(result.error).toBeUndefined();
    expect(states).toEqual(["replicating", "succeeded"]);
    expect(target.requests).toHaveLength(0);
    expect(source.requests).toEqual([
      {
        source: source.endpoint,
        target: target.endpoint,
        database: "orders",
        continuous: false,
        createTarget: true,
        direction: "source",
      },
    ]);
  });

  it("uses the target's API when asked to", async () => {
    const { source, target } = clusters();
    const job = new ReplicationJob({
      database: "orders",
      source,
      target,
      useTarget: true,
    });
    await job.run();
    expect(source.requests).toHaveLength(0);
    expect(target.requests).toHaveLength(1);
    expect(target.requests[0].direction).toBe("target");
  });

  it("records the error verbatim and does not retry permanent errors", async () => {
    const err = new NotFoundError("replication of orders: Database does not exist.", {
      statusCode: 404,
      body: { error: "not_found", reason: "Database does not exist." },
    });
    const { source, target } = clusters({
      behavior: () => {
        throw err;
      },
    });
    const job = new ReplicationJob({ database: "orders", source, target, sleep: noSleep });
    const result = await job.run();
    expect(job.state).toBe("failed");
    expect(result.outcome).toBe("failed");
    expect(result.attempts).toBe(1);
    expect(result.error).toEqual({
      kind: "not-found",
      message: "replication of orders: Database does not exist.",
      statusCode: 404,
      body: { error: "not_found", reason: "Database does not exist." },
    });
  });

  it("retries transient errors with backoff", async () => {
    let calls = 0;
    const delays: number[] = [];
    const { source, target } = clusters({
      behavior: () => {
        calls += 1;
        if (calls < 3) throw new TransientError("socket hang up");
        return { ok: true, docsWritten: 7 };
      },
    });
    const job = new ReplicationJob({
      database: "orders",
      source,
      target,
      maxRetries: 2,
      retryDelayMs: 100,
      sleep: async (ms) => {
        delays.push(ms);
      },
    });
    const result = await job.run();
    expect(result.outcome).toBe("succeeded");
    expect(result.attempts).toBe(3);
    expect(result.docsWritten).toBe(7);
    expect(delays).toEqual([100, 200]);
  });

  it("gives up after the retry budget", async () => {
    const { source, target } = clusters({
      behavior: () => {
        throw new TransientError("timeout");
      },
    });
    const job = new ReplicationJob({
      database: "orders",
      source,
      target,
      maxRetries: 1,
      sleep: noSleep,
    });
    const result = await job.run();
    expect(result.outcome).toBe("failed");
    expect(result.attempts).toBe(2);
    expect(result.error?.kind).toBe("transient");
  });

  it("stops retrying once abandoned", async () => {
    const controller = new AbortController();
    const { source, target } = clusters({
      behavior: () => {
        throw new TransientError("timeout");
      },
    });
    const job = new ReplicationJob({
      database: "orders",
      source,
      target,
      maxRetries: 5,
      sleep: async () => controller.abort(),
    });
    const result = await job.run(controller.signal);
    expect(result.attempts).toBe(1);
    expect(result.error).toEqual({
      kind: "cancelled",
      message: "replication of orders abandoned",
    });
  });

  it("establishes continuous replication through the same cluster", async () => {
    const { source, target } = clusters();
    const states: JobState[] = [];
    const job = new ReplicationJob({
      database: "orders",
      source,
      target,
      useTarget: true,
      permanent: true,
      onStateChange: (state) => states.push(state),
    });
    const result = await job.run();
    expect(result.outcome).toBe("succeeded");
    expect(result.continuous).toBe("established");
    expect(result.attempts).toBe(2);
    expect(states).toEqual(["replicating", "succeeded", "continuous-established"]);
    expect(target.requests.map((r) => r.continuous)).toEqual([false, true]);
    expect(source.requests).toHaveLength(0);
  });

  it("annotates a failed continuous setup without failing the job", async () => {
    const entries: LogEntry[] = [];
    const { source, target } = clusters({
      behavior: (request) => {
        if (request.continuous) {
          throw new ConflictError("continuous replication of orders: exists", {
            statusCode: 409,
          });
        }
        return { ok: true };
      },
    });
    const job = new ReplicationJob({
      database: "orders",
      source,
      target,
      permanent: true,
      logger: new StructuredLogger({ sink: (e) => entries.push(e), minLevel: "warn" }),
    });
    const result = await job.run();
    expect(job.state).toBe("succeeded");
    expect(result.outcome).toBe("succeeded");
    expect(result.error).toBeUndefined();
    expect(result.continuous).toBe("failed");
    expect(result.continuousError).toEqual({
      kind: "conflict",
      message: "continuous replication of orders: exists",
      statusCode: 409,
    });
    expect(entries.map((e) => [e.level, e.scope, e.message])).toEqual([
      ["warn", "job", "failed to set up continuous replication of database orders"],
    ]);
  });

  it("cannot run twice", async () => {
    const { source, target } = clusters();
    const job = new ReplicationJob({ database: "orders", source, target });
    await job.run();
    await expect(job.run()).rejects.toThrow(
      "replication job for orders already started",
    );
  });
});
