// src/selection.ts
import type { ClusterClient } from "./cluster-client.js";
import { encodeDatabaseName } from "./endpoint.js";
import { ConfigError, EmptySelectionError } from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";
import { dedupe } from "./util.js";

export type SelectionPolicy = {
  readonly mode: "explicit" | "all";
  // explicit names, deduplicated; empty in "all" mode
  readonly databases: readonly string[];
  readonly skip: ReadonlySet<string>;
  readonly includeSystem: boolean;
};

export type SelectionInput = {
  databases?: readonly string[];
  all?: boolean;
  skip?: string | readonly string[];
  systemDbs?: boolean;
};

export type SkipReason = "skip-list" | "system";

export type SkippedDatabase = { name: string; reason: SkipReason };

export type Selection = {
  databases: string[];
  skipped: SkippedDatabase[];
};

export function isSystemDatabase(name: string): boolean {
  return name.startsWith("_");
}

/** Accepts "a,b" as well as repeated values; blanks are dropped. */
export function parseSkipList(raw: string | readonly string[] | undefined): string[] {
  if (raw == null) return [];
  const parts = typeof raw === "string" ? [raw] : raw;
  return dedupe(
    parts
      .flatMap((part) => part.split(","))
      .map((part) => part.trim())
      .filter(Boolean),
  );
}

// commander collector for a repeatable --skip
export function collectSkipOption(value: string, previous: string[] = []): string[] {
  return [...previous, ...parseSkipList(value)];
}

export function buildSelectionPolicy(input: SelectionInput): SelectionPolicy {
  const explicit = input.databases ?? [];
  const all = input.all === true;
  if (all && explicit.length > 0) {
    throw new ConfigError(
      "--all and explicit database names are mutually exclusive",
    );
  }
  if (!all && explicit.length === 0) {
    throw new ConfigError("specify databases to replicate or --all");
  }
  for (const name of explicit) {
    if (!name.trim()) {
      throw new ConfigError("database names must not be empty");
    }
  }
  const policy: SelectionPolicy = {
    mode: all ? "all" : "explicit",
    databases: Object.freeze(dedupe(explicit)),
    skip: new Set(parseSkipList(input.skip)),
    includeSystem: input.systemDbs === true,
  };
  return Object.freeze(policy);
}

function skipReason(name: string, policy: SelectionPolicy): SkipReason | null {
  if (policy.skip.has(name) || policy.skip.has(encodeDatabaseName(name))) {
    return "skip-list";
  }
  if (!policy.includeSystem && isSystemDatabase(name)) {
    return "system";
  }
  return null;
}

export async function selectDatabases(
  policy: SelectionPolicy,
  source: Pick<ClusterClient, "listDatabases">,
  logger: Logger = new NullLogger(),
): Promise<Selection> {
  let candidates: readonly string[];
  if (policy.mode === "explicit") {
    candidates = policy.databases;
  } else {
    logger.info("getting list of all databases in source");
    candidates = await source.listDatabases();
    logger.info("discovered databases", { count: candidates.length });
  }

  const databases: string[] = [];
  const skipped: SkippedDatabase[] = [];
  for (const name of dedupe(candidates)) {
    if (!name) {
      logger.warn("ignoring database with an empty name");
      continue;
    }
    const reason = skipReason(name, policy);
    if (reason) {
      logger.info(
        reason === "system"
          ? `skipping system database ${name}`
          : `skipping database ${name}`,
      );
      skipped.push({ name, reason });
      continue;
    }
    databases.push(name);
  }

  if (databases.length === 0) {
    throw new EmptySelectionError();
  }
  return { databases, skipped };
}
