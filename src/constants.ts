// src/constants.ts

export const CLI_NAME = "couch-replicate";

// ---------- env knobs ----------
const envNum = (k: string, def: number) => {
  const raw = process.env[k];
  if (raw == null || raw.trim() === "") return def;
  const n = Number(raw);
  return Number.isFinite(n) ? n : def;
};

export const DEFAULT_CONCURRENCY = envNum("COUCH_REPLICATE_CONCURRENCY", 5);

// applies to discovery and continuous setup; one-shot replications have no
// overall timeout
export const DEFAULT_REQUEST_TIMEOUT_MS = envNum(
  "COUCH_REPLICATE_REQUEST_TIMEOUT_MS",
  30_000,
);

export const DEFAULT_MAX_RETRIES = envNum("COUCH_REPLICATE_MAX_RETRIES", 2);

export const DEFAULT_RETRY_DELAY_MS = envNum(
  "COUCH_REPLICATE_RETRY_DELAY_MS",
  2_000,
);
