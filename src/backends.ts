import type { Env } from "./config.js";
import { ServiceUnavailableError, type BackendId } from "./errors.js";

export type Backend = {
  id: BackendId;
  baseUrl: string;
  unavailable: (cause?: unknown) => ServiceUnavailableError;
};

export type Backends = {
  aggregator: Backend;
  content: Backend;
  membership: Backend | null;
};

export function defineBackend(id: BackendId, baseUrl: string): Backend {
  return {
    id,
    baseUrl: baseUrl.replace(/\/+$/, ""),
    unavailable: (cause?: unknown) => new ServiceUnavailableError(id, cause),
  };
}

// Each configured base endpoint is bound to its own failure variant here, once.
export function defineBackends(env: Pick<Env, "AGGREGATOR_BASE_ENDPOINT" | "CONTENT_BASE_ENDPOINT" | "MEMBERSHIP_BASE_ENDPOINT">): Backends {
  return {
    aggregator: defineBackend("aggregator", env.AGGREGATOR_BASE_ENDPOINT),
    content: defineBackend("content", env.CONTENT_BASE_ENDPOINT),
    membership: env.MEMBERSHIP_BASE_ENDPOINT ? defineBackend("membership", env.MEMBERSHIP_BASE_ENDPOINT) : null,
  };
}
