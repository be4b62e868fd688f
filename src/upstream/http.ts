import type { z } from "zod";
import type { Backend } from "../backends.js";
import { UpstreamDecodeError, UpstreamStatusError } from "../errors.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type UpstreamOptions = {
  timeoutMs: number;
  fetchImpl?: FetchLike;
};

export type UpstreamRequest = {
  method: string;
  headers?: Record<string, string>;
  body?: string | Buffer;
};

export type UpstreamResponse = {
  status: number;
  headers: Headers;
  body: Buffer;
};

/**
 * Replaces `{name}` placeholders in an endpoint template with the given
 * arguments, in order, each URL-encoded.
 */
export function makeUrlToEndpoint(baseUrl: string, template: string, ...args: Array<string | number>): string {
  let i = 0;
  const path = template.replace(/\{[^}]+\}/g, (placeholder) => {
    if (i >= args.length) throw new Error(`missing value for ${placeholder} in endpoint ${template}`);
    return encodeURIComponent(String(args[i++]));
  });
  return `${baseUrl.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}

// One outbound call, no retries. Transport failures become the backend's own error.
export async function callUpstream(
  backend: Backend,
  url: string,
  req: UpstreamRequest,
  opts: UpstreamOptions,
): Promise<UpstreamResponse> {
  const doFetch = opts.fetchImpl ?? fetch;
  const controller = new AbortController();
  const t = setTimeout(() => controller.abort(), opts.timeoutMs);
  try {
    const res = await doFetch(url, {
      method: req.method,
      headers: req.headers,
      body: req.body,
      signal: controller.signal,
    });
    const body = Buffer.from(await res.arrayBuffer());
    return { status: res.status, headers: res.headers, body };
  } catch (err: unknown) {
    throw backend.unavailable(err);
  } finally {
    clearTimeout(t);
  }
}


export function expectOk(backend: Backend, res: UpstreamResponse): UpstreamResponse {
  if (res.status !== 200) {
    throw new UpstreamStatusError(backend.id, res.status, res.body, res.headers.get("content-type"));
  }
  return res;
}

export function decodeJson<S extends z.ZodTypeAny>(backend: Backend, schema: S, body: Buffer): z.output<S> {
  let raw: unknown;
  try {
    raw = JSON.parse(body.toString("utf8"));
  } catch (err: unknown) {
    throw new UpstreamDecodeError(backend.id, "body is not valid JSON", err);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new UpstreamDecodeError(backend.id, msg, parsed.error);
  }
  return parsed.data;
}
