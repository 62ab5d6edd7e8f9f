// src/cluster-client.ts
import http from "node:http";
import https from "node:https";
import net from "node:net";
import tls from "node:tls";
import nano from "nano";
import type { ClusterEndpoint } from "./endpoint.js";
import {
  AuthError,
  ClusterRequestError,
  ConflictError,
  DiscoveryError,
  NotFoundError,
  RemoteError,
  TransientError,
} from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";
import { DEFAULT_REQUEST_TIMEOUT_MS } from "./constants.js";

export type ReplicationDirection = "source" | "target";

export interface ReplicationRequest {
  readonly source: ClusterEndpoint;
  readonly target: ClusterEndpoint;
  readonly database: string;
  readonly continuous: boolean;
  readonly createTarget: boolean;
  // whose _replicate endpoint receives the request
  readonly direction: ReplicationDirection;
}

export interface ReplicationOutcome {
  ok: true;
  sessionId?: string;
  docsWritten?: number;
  docWriteFailures?: number;
}

export interface ClusterClient {
  readonly endpoint: ClusterEndpoint;
  listDatabases(): Promise<string[]>;
  replicate(request: ReplicationRequest): Promise<ReplicationOutcome>;
}

export type ReplicationBody = {
  source: string;
  target: string;
  create_target: boolean;
  continuous?: true;
};

export function replicationBody(request: ReplicationRequest): ReplicationBody {
  const body: ReplicationBody = {
    source: request.source.databaseUrl(request.database),
    target: request.target.databaseUrl(request.database),
    create_target: request.createTarget,
  };
  if (request.continuous) body.continuous = true;
  return body;
}

// ---------- nano ----------

type CouchReplicateOptions = { create_target?: boolean; continuous?: boolean };

type CouchReplicateResponse = {
  ok: boolean;
  session_id?: string;
  history?: ReadonlyArray<{ docs_written?: number; doc_write_failures?: number }>;
};

/** The slice of a nano ServerScope this client talks to. */
export type CouchServer = {
  db: {
    list(): Promise<string[]>;
    replicate(
      source: string,
      target: string,
      opts?: CouchReplicateOptions,
    ): Promise<CouchReplicateResponse>;
  };
};

export type CouchServerConfig = {
  url: string;
  requestDefaults?: { timeout?: number; agent?: http.Agent };
};

export type CouchServerFactory = (config: CouchServerConfig) => CouchServer;

const defaultServerFactory: CouchServerFactory = (config) => nano(config);

export type NanoClusterClientOptions = {
  timeoutMs?: number;
  logger?: Logger;
  createServer?: CouchServerFactory;
};

// ---------- connect timeout ----------

export class ConnectTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`connection not established within ${timeoutMs} ms`);
    this.name = "ConnectTimeoutError";
  }
}

/**
 * Destroys the socket unless it connects within `timeoutMs`. Once connected
 * the socket has no deadline, so a request may wait on the remote for as
 * long as it takes.
 */
export function boundConnect<S extends net.Socket>(
  socket: S,
  timeoutMs: number,
  connectEvent: "connect" | "secureConnect" = "connect",
): S {
  const timer = setTimeout(
    () => socket.destroy(new ConnectTimeoutError(timeoutMs)),
    timeoutMs,
  );
  const clear = () => clearTimeout(timer);
  socket.once(connectEvent, clear);
  socket.once("close", clear);
  return socket;
}

function tcpOptions(
  options: http.ClientRequestArgs,
  fallbackPort: number,
): net.TcpNetConnectOpts {
  return {
    host: options.host ?? options.hostname ?? "localhost",
    port: Number(options.port ?? options.defaultPort ?? fallbackPort),
    localAddress: options.localAddress,
    family: options.family,
    lookup: options.lookup,
  };
}

class ConnectTimeoutHttpAgent extends http.Agent {
  constructor(private readonly connectTimeoutMs: number) {
    super({ keepAlive: true });
  }

  createConnection(options: http.ClientRequestArgs): net.Socket {
    return boundConnect(
      net.connect(tcpOptions(options, 80)),
      this.connectTimeoutMs,
    );
  }
}

class ConnectTimeoutHttpsAgent extends https.Agent {
  constructor(private readonly connectTimeoutMs: number) {
    super({ keepAlive: true });
  }

  createConnection(options: https.RequestOptions): tls.TLSSocket {
    const tcp = tcpOptions(options, 443);
    const host = tcp.host ?? "localhost";
    return boundConnect(
      tls.connect({
        ...tcp,
        servername: options.servername ?? (net.isIP(host) ? undefined : host),
        ca: options.ca,
        cert: options.cert,
        key: options.key,
        rejectUnauthorized: options.rejectUnauthorized,
        checkServerIdentity: options.checkServerIdentity,
      }),
      this.connectTimeoutMs,
      "secureConnect",
    );
  }
}

/** HTTP(S) agent for `url` whose sockets must connect within `timeoutMs`. */
export function connectTimeoutAgent(url: string, timeoutMs: number): http.Agent {
  return url.startsWith("https:")
    ? new ConnectTimeoutHttpsAgent(timeoutMs)
    : new ConnectTimeoutHttpAgent(timeoutMs);
}

const TRANSIENT_STATUS = new Set([408, 429, 502, 503, 504]);

function readField(err: unknown, key: string): unknown {
  if (typeof err !== "object" || err === null || !(key in err)) {
    return undefined;
  }
  return Reflect.get(err, key);
}

function readString(err: unknown, key: string): string | undefined {
  const value = readField(err, key);
  return typeof value === "string" && value ? value : undefined;
}

/**
 * Map a rejected nano request onto the per-job error taxonomy. nano rejects
 * with an Error that carries `statusCode`, and CouchDB's `error`/`reason`
 * pair when the server answered at all.
 */
export function classifyClusterError(
  err: unknown,
  context: string,
): ClusterRequestError {
  if (err instanceof ClusterRequestError) return err;
  const rawStatus = readField(err, "statusCode");
  const statusCode = typeof rawStatus === "number" ? rawStatus : undefined;
  const error = readString(err, "error");
  const reason = readString(err, "reason");
  const detail =
    reason ??
    error ??
    ((err instanceof Error ? err.message : String(err)) || "unknown error");
  const message = `${context}: ${detail}`;
  const body =
    error !== undefined || reason !== undefined ? { error, reason } : undefined;
  const data = { statusCode, body, cause: err };

  if (statusCode === undefined || TRANSIENT_STATUS.has(statusCode)) {
    return new TransientError(message, data);
  }
  if (statusCode === 401 || statusCode === 403) {
    return new AuthError(message, data);
  }
  if (statusCode === 404) {
    return new NotFoundError(message, data);
  }
  if (statusCode === 409) {
    return new ConflictError(message, data);
  }
  return new RemoteError(message, data);
}

export class NanoClusterClient implements ClusterClient {
  private readonly server: CouchServer;
  // only the connect is bounded: one-shot replications block until the
  // remote is done
  private readonly longServer: CouchServer;
  private readonly logger: Logger;

  constructor(
    readonly endpoint: ClusterEndpoint,
    {
      timeoutMs = DEFAULT_REQUEST_TIMEOUT_MS,
      logger,
      createServer = defaultServerFactory,
    }: NanoClusterClientOptions = {},
  ) {
    this.server = createServer({
      url: endpoint.url,
      requestDefaults: { timeout: timeoutMs },
    });
    this.longServer = createServer({
      url: endpoint.url,
      requestDefaults: { agent: connectTimeoutAgent(endpoint.url, timeoutMs) },
    });
    this.logger = (logger ?? new NullLogger()).child(endpoint.role);
  }

  async listDatabases(): Promise<string[]> {
    this.logger.debug("GET /_all_dbs", { cluster: this.endpoint.redacted });
    let names: unknown;
    try {
      names = await this.server.db.list();
    } catch (err) {
      const cause = classifyClusterError(
        err,
        `listing databases on ${this.endpoint.redacted}`,
      );
      throw new DiscoveryError(cause.message, { cause });
    }
    if (
      !Array.isArray(names) ||
      !names.every((name): name is string => typeof name === "string")
    ) {
      throw new DiscoveryError(
        `unexpected /_all_dbs response from ${this.endpoint.redacted}`,
      );
    }
    this.logger.debug("GET /_all_dbs ok", { count: names.length });
    return names;
  }

  async replicate(request: ReplicationRequest): Promise<ReplicationOutcome> {
    const body = replicationBody(request);
    const server = request.continuous ? this.server : this.longServer;
    this.logger.debug("POST /_replicate", {
      cluster: this.endpoint.redacted,
      source: request.source.redactedDatabaseUrl(request.database),
      target: request.target.redactedDatabaseUrl(request.database),
      continuous: request.continuous,
      create_target: body.create_target,
    });
    const context = `${request.continuous ? "continuous " : ""}replication of ${request.database}`;
    let res: CouchReplicateResponse;
    try {
      res = await server.db.replicate(body.source, body.target, {
        create_target: body.create_target,
        ...(body.continuous ? { continuous: true } : {}),
      });
    } catch (err) {
      const classified = classifyClusterError(err, context);
      this.logger.debug("POST /_replicate failed", {
        database: request.database,
        kind: classified.kind,
        statusCode: classified.statusCode,
      });
      throw classified;
    }
    if (!res.ok) {
      throw new RemoteError(`${context}: remote reported ok=false`, {
        body: res,
      });
    }
    this.logger.debug("POST /_replicate ok", {
      database: request.database,
      session: res.session_id,
    });
    const outcome: ReplicationOutcome = { ok: true };
    if (res.session_id) outcome.sessionId = res.session_id;
    const last = res.history?.[0];
    if (last?.docs_written !== undefined) outcome.docsWritten = last.docs_written;
    if (last?.doc_write_failures !== undefined) {
      outcome.docWriteFailures = last.doc_write_failures;
    }
    return outcome;
  }
}
