import {
  EXIT_CONFIG,
  EXIT_FAILURE,
  buildProgram,
  cliOptsToReplicateOptions,
  executeReplicate,
  exitCodeFor,
} from "../cli.js";
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_MAX_RETRIES,
  DEFAULT_REQUEST_TIMEOUT_MS,
} from "../constants.js";
import { ConfigError, DiscoveryError, EmptySelectionError } from "../errors.js";
import { StructuredLogger, type LogEntry } from "../logger.js";
import type { ReplicateOptions } from "../replicate.js";

async function parse(args: string[]) {
  const captured: ReplicateOptions[] = [];
  const codes: number[] = [];
  const program = buildProgram(
    async (options) => {
      captured.push(options);
      return 0;
    },
    (code) => codes.push(code),
  );
  program.exitOverride();
  program.configureOutput({ writeErr: () => {}, writeOut: () => {} });
  await program.parseAsync(args, { from: "user" });
  return { options: captured[0], captured, codes };
}

describe("couch-replicate CLI", () => {
  let previousEcho: string | undefined;

  beforeEach(() => {
    previousEcho = process.env.COUCH_REPLICATE_DISABLE_LOG_ECHO;
    process.env.COUCH_REPLICATE_DISABLE_LOG_ECHO = "1";
  });

  afterEach(() => {
    if (previousEcho === undefined) {
      delete process.env.COUCH_REPLICATE_DISABLE_LOG_ECHO;
    } else {
      process.env.COUCH_REPLICATE_DISABLE_LOG_ECHO = previousEcho;
    }
  });

  it("parses explicit databases with defaults", async () => {
    const { options, codes } = await parse([
      "-s",
      "http://alpha.test:5984",
      "-t",
      "http://beta.test:5984",
      "db1",
      "db2",
    ]);
    expect(codes).toEqual([0]);
    expect(options).toMatchObject({
      source: "http://alpha.test:5984",
      target: "http://beta.test:5984",
      databases: ["db1", "db2"],
      all: false,
      skip: [],
      concurrency: DEFAULT_CONCURRENCY,
      useTarget: false,
      systemDbs: false,
      permanent: false,
      createTarget: true,
      quiet: false,
      requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
      maxRetries: DEFAULT_MAX_RETRIES,
    });
  });

  it("parses every flag", async () => {
    const { options } = await parse([
      "--source",
      "http://alpha.test:5984",
      "--target",
      "http://beta.test:5984",
      "--all",
      "--skip",
      "db1,db2",
      "-i",
      "db3",
      "-c",
      "3",
      "--use_target",
      "--system_dbs",
      "-p",
      "--no-create-target",
      "--request-timeout",
      "1500",
      "--retries",
      "0",
      "-q",
    ]);
    expect(options).toMatchObject({
      databases: [],
      all: true,
      skip: ["db1", "db2", "db3"],
      concurrency: 3,
      useTarget: true,
      systemDbs: true,
      permanent: true,
      createTarget: false,
      quiet: true,
      requestTimeoutMs: 1500,
      maxRetries: 0,
    });
  });

  it("exits with the configuration code on a bad concurrency", async () => {
    const { captured, codes } = await parse([
      "-s",
      "http://alpha.test",
      "-t",
      "http://beta.test",
      "-c",
      "0",
      "db1",
    ]);
    expect(captured).toHaveLength(0);
    expect(codes).toEqual([EXIT_CONFIG]);
  });

  it("requires source and target", async () => {
    await expect(parse(["-t", "http://beta.test", "db1"])).rejects.toMatchObject({
      code: "commander.missingMandatoryOptionValue",
    });
  });

  it("rejects unknown log levels", async () => {
    await expect(
      parse(["-s", "http://a.test", "-t", "http://b.test", "--log-level", "loud", "db1"]),
    ).rejects.toMatchObject({ code: "commander.invalidArgument" });
  });
});

describe("cliOptsToReplicateOptions", () => {
  it("warns when --skip is used without --all", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({ sink: (e) => entries.push(e) });
    const options = cliOptsToReplicateOptions(
      ["db1"],
      { source: "http://a.test", target: "http://b.test", skip: ["db1"] },
      logger,
    );
    expect(options.skip).toEqual(["db1"]);
    expect(entries.map((e) => e.message)).toEqual([
      "--skip is meant for --all; applying it to the explicit list",
    ]);
  });

  it("rejects negative retry counts", () => {
    expect(() =>
      cliOptsToReplicateOptions([], {
        source: "http://a.test",
        target: "http://b.test",
        retries: "-1",
      }),
    ).toThrow("--retries must be a non-negative integer, got -1");
  });
});

describe("exit codes", () => {
  it("maps fatal errors", () => {
    expect(exitCodeFor(new ConfigError("bad"))).toBe(EXIT_CONFIG);
    expect(exitCodeFor(new EmptySelectionError())).toBe(EXIT_CONFIG);
    expect(exitCodeFor(new DiscoveryError("down"))).toBe(EXIT_FAILURE);
    expect(exitCodeFor(new Error("bug"))).toBeNull();
  });

  it("returns the configuration code for --all with explicit names", async () => {
    const entries: LogEntry[] = [];
    const sigintListeners = process.listenerCount("SIGINT");
    const logger = new StructuredLogger({ sink: (e) => entries.push(e) });
    const options = cliOptsToReplicateOptions(
      ["db1"],
      { source: "http://a.test", target: "http://b.test", all: true },
      logger,
    );
    await expect(executeReplicate(options)).resolves.toBe(EXIT_CONFIG);
    expect(entries.map((e) => [e.level, e.message])).toEqual([
      ["error", "--all and explicit database names are mutually exclusive"],
    ]);
    expect(process.listenerCount("SIGINT")).toBe(sigintListeners);
  });
});
