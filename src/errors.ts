import { HttpError } from "./util/http.js";

export type BackendId = "aggregator" | "content" | "membership";

const UNAVAILABLE: Record<BackendId, { code: string; message: string }> = {
  aggregator: { code: "aggregator_service_unavailable", message: "Aggregator service is unavailable" },
  content: { code: "content_service_unavailable", message: "Content service is unavailable" },
  membership: { code: "identity_service_unavailable", message: "Identity service is unavailable" },
};

/** Transport-level failure reaching one specific backend. */
export class ServiceUnavailableError extends HttpError {
  readonly backend: BackendId;

  constructor(backend: BackendId, cause?: unknown) {
    const { code, message } = UNAVAILABLE[backend];
    super(503, code, message);
    this.name = "ServiceUnavailableError";
    this.backend = backend;
    if (cause !== undefined) this.cause = cause;
  }
}

/** The rule content directory was not ready within its wait budget. */
export class ContentTimeoutError extends HttpError {
  constructor(waitedMs: number) {
    super(503, "content_timeout", "rule content is not available yet", { waited_ms: waitedMs });
    this.name = "ContentTimeoutError";
  }
}

export class PermissionDeniedError extends HttpError {
  constructor(message: string) {
    super(403, "permission_denied", message);
    this.name = "PermissionDeniedError";
  }
}

/**
 * Non-2xx answer from a backend. The error handler forwards status and body
 * to the caller unchanged.
 */
export class UpstreamStatusError extends Error {
  readonly backend: BackendId;
  readonly status: number;
  readonly body: Buffer;
  readonly contentType: string | null;

  constructor(backend: BackendId, status: number, body: Buffer, contentType: string | null) {
    super(`${backend} responded with status ${status}`);
    this.name = "UpstreamStatusError";
    this.backend = backend;
    this.status = status;
    this.body = body;
    this.contentType = contentType;
  }
}

/** A backend answered 2xx with a body that is not the expected JSON shape. */
export class UpstreamDecodeError extends Error {
  readonly backend: BackendId;

  constructor(backend: BackendId, message: string, cause?: unknown) {
    super(`${backend} response could not be decoded: ${message}`);
    this.name = "UpstreamDecodeError";
    this.backend = backend;
    if (cause !== undefined) this.cause = cause;
  }
}
