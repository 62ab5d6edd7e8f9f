#!/usr/bin/env node
// src/cli.ts
import fs from "node:fs";
import path from "node:path";
import { Command, Option } from "commander";
import {
  CLI_NAME,
  DEFAULT_CONCURRENCY,
  DEFAULT_MAX_RETRIES,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_RETRY_DELAY_MS,
} from "./constants.js";
import { ConfigError, DiscoveryError } from "./errors.js";
import {
  ConsoleLogger,
  LOG_LEVELS,
  resolveLogLevel,
  type Logger,
} from "./logger.js";
import { validateConcurrency } from "./job-scheduler.js";
import { runReplicate, type ReplicateOptions } from "./replicate.js";
import { collectSkipOption } from "./selection.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CONFIG = 2;

export type CliOptions = {
  source: string;
  target: string;
  all?: boolean;
  skip?: string[];
  concurrency?: string | number;
  use_target?: boolean;
  system_dbs?: boolean;
  permanent?: boolean;
  createTarget?: boolean;
  requestTimeout?: string | number;
  retries?: string | number;
  verbose?: boolean;
  debug?: boolean;
  quiet?: boolean;
  logLevel?: string;
};

export type ReplicateHandler = (options: ReplicateOptions) => Promise<number>;

function readVersion(): string {
  try {
    const raw: unknown = JSON.parse(
      fs.readFileSync(path.join(__dirname, "..", "package.json"), "utf8"),
    );
    const version =
      typeof raw === "object" && raw !== null && "version" in raw
        ? raw.version
        : undefined;
    return typeof version === "string" ? version : "0.0.0";
  } catch {
    return "0.0.0";
  }
}

function nonNegativeInt(name: string, value: string | number | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const n = typeof value === "number" ? value : Number(value.trim());
  if (!Number.isInteger(n) || n < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got ${value}`);
  }
  return n;
}

export function cliOptsToReplicateOptions(
  databases: string[],
  opts: CliOptions,
  logger?: Logger,
): ReplicateOptions {
  const skip = opts.skip ?? [];
  if (skip.length > 0 && !opts.all) {
    logger?.warn("--skip is meant for --all; applying it to the explicit list");
  }
  return {
    source: String(opts.source),
    target: String(opts.target),
    databases: [...databases],
    all: opts.all === true,
    skip,
    concurrency: validateConcurrency(opts.concurrency ?? DEFAULT_CONCURRENCY),
    useTarget: opts.use_target === true,
    systemDbs: opts.system_dbs === true,
    permanent: opts.permanent === true,
    createTarget: opts.createTarget !== false,
    quiet: opts.quiet === true,
    requestTimeoutMs: nonNegativeInt(
      "--request-timeout",
      opts.requestTimeout,
      DEFAULT_REQUEST_TIMEOUT_MS,
    ),
    maxRetries: nonNegativeInt("--retries", opts.retries, DEFAULT_MAX_RETRIES),
    retryDelayMs: DEFAULT_RETRY_DELAY_MS,
    logger,
  };
}

/** Exit code for an error that ended the run before every job could finish. */
export function exitCodeFor(err: unknown): number | null {
  if (err instanceof ConfigError) return EXIT_CONFIG;
  if (err instanceof DiscoveryError) return EXIT_FAILURE;
  return null;
}

/**
 * Run with interrupt handling: the first SIGINT/SIGTERM stops dispatching
 * new databases, the second abandons the ones still replicating.
 */
export async function executeReplicate(options: ReplicateOptions): Promise<number> {
  const logger = options.logger ?? new ConsoleLogger();
  const stop = new AbortController();
  const abandon = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    if (!stop.signal.aborted) {
      logger.warn(
        `${signal} received; waiting for active replications (interrupt again to abandon them)`,
      );
      stop.abort();
      return;
    }
    logger.warn(`${signal} received again; abandoning active replications`);
    abandon.abort();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
  try {
    const summary = await runReplicate(
      { ...options, logger },
      { stopSignal: stop.signal, abandonSignal: abandon.signal },
    );
    return summary.exitCode;
  } catch (err) {
    const code = exitCodeFor(err);
    if (code === null) throw err;
    logger.error(err instanceof Error ? err.message : String(err));
    return code;
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
}

export function buildProgram(
  handler: ReplicateHandler = executeReplicate,
  onExit: (code: number) => void = (code) => {
    process.exitCode = code;
  },
): Command {
  return new Command()
    .name(CLI_NAME)
    .description("Replicate databases between CouchDB clusters")
    .version(readVersion())
    .requiredOption(
      "-s, --source <url>",
      "URL of the CouchDB cluster to replicate from",
    )
    .requiredOption(
      "-t, --target <url>",
      "URL of the CouchDB cluster to replicate to",
    )
    .argument("[databases...]", "databases to replicate")
    .option(
      "-a, --all",
      "replicate all databases of the source (use with --skip for 'all but ...')",
      false,
    )
    .option(
      "-i, --skip <list>",
      "comma-separated databases to skip (repeatable)",
      collectSkipOption,
      [],
    )
    .option(
      "-c, --concurrency <n>",
      "maximum number of simultaneous replications",
      String(DEFAULT_CONCURRENCY),
    )
    .option(
      "--use_target",
      "use the target's _replicate API (default: the source's)",
      false,
    )
    .option(
      "--system_dbs",
      "do not skip system databases starting with '_' (_users, ...)",
      false,
    )
    .option(
      "-p, --permanent",
      "add continuous replication after the initial replication",
      false,
    )
    .option("--no-create-target", "do not create missing target databases")
    .option(
      "--request-timeout <ms>",
      "timeout for discovery and continuous setup, and for connecting",
      String(DEFAULT_REQUEST_TIMEOUT_MS),
    )
    .option(
      "--retries <n>",
      "retries per request after a transient error",
      String(DEFAULT_MAX_RETRIES),
    )
    .option("-v, --verbose", "log each database as it is replicated", false)
    .option("-d, --debug", "log every request and response", false)
    .addOption(
      new Option("--log-level <level>", "log verbosity").choices(LOG_LEVELS),
    )
    .option("-q, --quiet", "do not show banners, progress bar or summary", false)
    .action(async (databases: string[], opts: CliOptions) => {
      const logger = new ConsoleLogger(resolveLogLevel(opts));
      let options: ReplicateOptions;
      try {
        options = cliOptsToReplicateOptions(databases, opts, logger);
      } catch (err) {
        const code = exitCodeFor(err);
        if (code === null) throw err;
        logger.error(err instanceof Error ? err.message : String(err));
        onExit(code);
        return;
      }
      onExit(await handler(options));
    });
}

export async function main(argv: string[]): Promise<number> {
  let code = EXIT_OK;
  const program = buildProgram(executeReplicate, (c) => {
    code = c;
  });
  await program.parseAsync(argv);
  return code;
}

if (require.main === module) {
  main(process.argv).then(
    (code) => process.exit(code),
    (err: unknown) => {
      console.error(
        `${CLI_NAME} fatal:`,
        err instanceof Error ? (err.stack ?? err.message) : err,
      );
      process.exit(EXIT_FAILURE);
    },
  );
}
