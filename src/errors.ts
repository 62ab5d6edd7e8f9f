// src/errors.ts

export type ErrorKind =
  | "config"
  | "discovery"
  | "auth"
  | "not-found"
  | "conflict"
  | "transient"
  | "remote"
  | "cancelled";

export class ReplicatorError extends Error {
  readonly kind: ErrorKind;
  override readonly cause?: unknown;
  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = "ReplicatorError";
    this.kind = kind;
    this.cause = options?.cause;
  }
}

// Bad flag combinations and invalid values. Raised before any network call.
export class ConfigError extends ReplicatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("config", message, options);
    this.name = "ConfigError";
  }
}

export class EmptySelectionError extends ConfigError {
  constructor(message = "no databases left to replicate after filtering") {
    super(message);
    this.name = "EmptySelectionError";
  }
}

export class DiscoveryError extends ReplicatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("discovery", message, options);
    this.name = "DiscoveryError";
  }
}

export class CancelledError extends ReplicatorError {
  constructor(message = "cancelled") {
    super("cancelled", message);
    this.name = "CancelledError";
  }
}

export type ClusterRequestErrorData = {
  statusCode?: number;
  body?: unknown;
  cause?: unknown;
};

/**
 * A single request to a cluster failed. These never abort a run: the job
 * that saw it records it and the scheduler moves on.
 */
export abstract class ClusterRequestError extends ReplicatorError {
  readonly statusCode?: number;
  readonly body?: unknown;

  protected constructor(
    kind: ErrorKind,
    message: string,
    data: ClusterRequestErrorData = {},
  ) {
    super(kind, message, { cause: data.cause });
    this.statusCode = data.statusCode;
    this.body = data.body;
  }
}

export class AuthError extends ClusterRequestError {
  constructor(message: string, data?: ClusterRequestErrorData) {
    super("auth", message, data);
    this.name = "AuthError";
  }
}

export class NotFoundError extends ClusterRequestError {
  constructor(message: string, data?: ClusterRequestErrorData) {
    super("not-found", message, data);
    this.name = "NotFoundError";
  }
}

export class ConflictError extends ClusterRequestError {
  constructor(message: string, data?: ClusterRequestErrorData) {
    super("conflict", message, data);
    this.name = "ConflictError";
  }
}

export class TransientError extends ClusterRequestError {
  constructor(message: string, data?: ClusterRequestErrorData) {
    super("transient", message, data);
    this.name = "TransientError";
  }
}

export class RemoteError extends ClusterRequestError {
  constructor(message: string, data?: ClusterRequestErrorData) {
    super("remote", message, data);
    this.name = "RemoteError";
  }
}

export type JobErrorDetail = {
  kind: ErrorKind | "internal";
  message: string;
  statusCode?: number;
  body?: unknown;
};

export function describeError(err: unknown): JobErrorDetail {
  if (err instanceof ClusterRequestError) {
    const detail: JobErrorDetail = { kind: err.kind, message: err.message };
    if (err.statusCode !== undefined) detail.statusCode = err.statusCode;
    if (err.body !== undefined) detail.body = err.body;
    return detail;
  }
  if (err instanceof ReplicatorError) {
    return { kind: err.kind, message: err.message };
  }
  if (err instanceof Error) {
    return { kind: "internal", message: err.message };
  }
  return { kind: "internal", message: String(err) };
}
