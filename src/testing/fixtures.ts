import { vi } from "vitest";
import { RawRuleHit } from "../aggregator/schemas.js";
import { RuleContent } from "../content/schemas.js";
import type { Logger } from "../logger.js";
import type { FetchLike } from "../upstream/http.js";

export const CLUSTER_1 = "34c3ecc5-624a-49a5-bab8-4fdc5e51a266";
export const CLUSTER_2 = "74ae54aa-6577-4e80-85e7-697cb646ff37";
export const CLUSTER_3 = "a7467445-8d6a-43cc-b82c-7007664bdf69";

export function fakeLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

export function ruleHit(component: string, key: string, overrides: Partial<RawRuleHit> = {}): RawRuleHit {
  return RawRuleHit.parse({ component, key, ...overrides });
}

export function ruleContent(ruleId: string, errorKey: string, overrides: Partial<RuleContent> = {}): RuleContent {
  return RuleContent.parse({ rule_id: ruleId, error_key: errorKey, total_risk: 1, ...overrides });
}

export function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

type Route = (init: RequestInit | undefined) => Response | Promise<Response>;

/**
 * Fetch stand-in answering from a table keyed by "METHOD url". Unknown
 * requests fail like an unreachable host.
 */
export function stubFetch(routes: Record<string, Route>) {
  return vi.fn<FetchLike>(async (input, init) => {
    const route = routes[`${init?.method ?? "GET"} ${input}`];
    if (!route) throw new TypeError(`fetch failed: ${input}`);
    return route(init);
  });
}
