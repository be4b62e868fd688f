import type { FastifyReply, FastifyRequest } from "fastify";
import type { Backend } from "../backends.js";
import { callUpstream, type UpstreamOptions } from "../upstream/http.js";
import { routeParams } from "../util/params.js";

export type ProxyHeaders = Record<string, string | string[] | undefined>;

export type ProxyRequest = {
  method: string;
  /** Path and query relative to the API prefix, starting with "/". */
  path: string;
  headers: ProxyHeaders;
  params: Record<string, string>;
  body: string | Buffer | undefined;
};

export type ProxyResponse = {
  status: number;
  headers: Headers;
  body: Buffer;
};

export type RequestModifier = (req: ProxyRequest) => ProxyRequest | Promise<ProxyRequest>;

// Receives the request as finally forwarded, for modifiers that depend on the caller.
export type ResponseModifier = (res: ProxyResponse, req: ProxyRequest) => ProxyResponse | Promise<ProxyResponse>;

export type ProxyOptions = {
  requestModifiers?: RequestModifier[];
  responseModifiers?: ResponseModifier[];
};

const HOP_BY_HOP = new Set([
  "connection",
  "keep-alive",
  "proxy-connection",
  "transfer-encoding",
  "te",
  "trailer",
  "upgrade",
  "host",
  "content-length",
]);

export async function modifyRequest(modifiers: readonly RequestModifier[], req: ProxyRequest): Promise<ProxyRequest> {
  let out = req;
  for (const modifier of modifiers) {
    out = await modifier(out);
  }
  return out;
}

export async function modifyResponse(
  modifiers: readonly ResponseModifier[],
  res: ProxyResponse,
  req: ProxyRequest,
): Promise<ProxyResponse> {
  let out = res;
  for (const modifier of modifiers) {
    out = await modifier(out, req);
  }
  return out;
}

export function forwardHeaders(headers: ProxyHeaders): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined || HOP_BY_HOP.has(name.toLowerCase())) continue;
    out[name] = Array.isArray(value) ? value.join(", ") : value;
  }
  return out;
}

export function stripPrefix(url: string, apiPrefix: string): string {
  const prefix = apiPrefix.replace(/\/+$/, "");
  if (prefix && (url === prefix || url.startsWith(`${prefix}/`) || url.startsWith(`${prefix}?`))) {
    const rest = url.slice(prefix.length);
    return rest.startsWith("/") ? rest : `/${rest}`;
  }
  return url.startsWith("/") ? url : `/${url}`;
}

function requestBody(method: string, body: unknown): string | Buffer | undefined {
  if (method === "GET" || method === "HEAD") return undefined;
  if (body === undefined || body === null) return undefined;
  if (Buffer.isBuffer(body) || typeof body === "string") return body;
  return JSON.stringify(body);
}

export function toProxyRequest(req: FastifyRequest, apiPrefix: string): ProxyRequest {
  return {
    method: req.method,
    path: stripPrefix(req.url, apiPrefix),
    headers: { ...req.headers },
    params: routeParams(req.params),
    body: requestBody(req.method, req.body),
  };
}

/**
 * Builds a handler forwarding the incoming request to `backend`: request
 * modifiers run in order (the first failure stops the chain), the request goes
 * out with the caller's headers, response modifiers run in order, and the final
 * status and body are sent back unchanged.
 *
 * A transport failure surfaces as the backend's own service-unavailable error.
 */
export function createProxyHandler(
  backend: Backend,
  opts: ProxyOptions & { apiPrefix: string; http: UpstreamOptions },
) {
  const requestModifiers = opts.requestModifiers ?? [];
  const responseModifiers = opts.responseModifiers ?? [];

  return async (req: FastifyRequest, reply: FastifyReply) => {
    const outgoing = await modifyRequest(requestModifiers, toProxyRequest(req, opts.apiPrefix));
    const url = `${backend.baseUrl}${outgoing.path}`;
    req.log.info({ backend: backend.id, method: outgoing.method, path: outgoing.path }, "handling request as a proxy");

    const upstream = await callUpstream(
      backend,
      url,
      { method: outgoing.method, headers: forwardHeaders(outgoing.headers), body: outgoing.body },
      opts.http,
    );
    const res = await modifyResponse(responseModifiers, upstream, outgoing);

    const contentType = res.headers.get("content-type");
    if (contentType) reply.header("content-type", contentType);
    return reply.code(res.status).send(res.body);
  };
}
