// src/endpoint.ts
import { ConfigError } from "./errors.js";

export type EndpointRole = "source" | "target";

// Form-encoded path segment: everything but letters, digits and "_.-~" is
// escaped, so "a/b" and "a(b)" survive the remote's _replicate handler.
export function encodeDatabaseName(name: string): string {
  return encodeURIComponent(name).replace(
    /[!'()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

function stripTrailingSlashes(href: string): string {
  return href.replace(/\/+$/, "");
}

export class ClusterEndpoint {
  private constructor(
    readonly role: EndpointRole,
    readonly url: string,
    readonly redacted: string,
    readonly hasCredentials: boolean,
  ) {
    Object.freeze(this);
  }

  static parse(raw: string, role: EndpointRole): ClusterEndpoint {
    const text = raw.trim();
    if (!text) {
      throw new ConfigError(`${role} cluster URL is empty`);
    }
    let parsed: URL;
    try {
      parsed = new URL(text);
    } catch (err) {
      throw new ConfigError(`invalid ${role} cluster URL: ${text}`, {
        cause: err,
      });
    }
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      throw new ConfigError(
        `${role} cluster URL must use http or https, got ${parsed.protocol}`,
      );
    }
    parsed.search = "";
    parsed.hash = "";
    const url = stripTrailingSlashes(parsed.toString());
    const hasCredentials = parsed.username !== "" || parsed.password !== "";
    if (parsed.password) {
      parsed.password = "***";
    }
    const redacted = stripTrailingSlashes(parsed.toString());
    return new ClusterEndpoint(role, url, redacted, hasCredentials);
  }

  databaseUrl(name: string): string {
    return `${this.url}/${encodeDatabaseName(name)}`;
  }

  redactedDatabaseUrl(name: string): string {
    return `${this.redacted}/${encodeDatabaseName(name)}`;
  }

  toString(): string {
    return this.redacted;
  }
}
