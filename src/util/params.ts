import { z } from "zod";
import { badRequest } from "./http.js";

export const DisabledParam = "disabled";
export const OsdEligibleParam = "osd_eligible";

const TRUE_VALUES = new Set(["1", "t", "true"]);
const FALSE_VALUES = new Set(["0", "f", "false"]);

export class InvalidFlagError extends Error {
  readonly param: string;

  constructor(param: string, value: string) {
    super(`invalid boolean value for '${param}': ${value}`);
    this.name = "InvalidFlagError";
    this.param = param;
  }
}

/** Absent means false; anything other than a recognised boolean spelling throws `InvalidFlagError`. */
export function parseBoolFlag(query: unknown, param: string): boolean {
  if (!query || typeof query !== "object") return false;
  const raw: unknown = Object.entries(query).find(([k]) => k === param)?.[1];
  if (raw === undefined) return false;
  const value = Array.isArray(raw) ? String(raw[0] ?? "") : String(raw);
  const v = value.trim().toLowerCase();
  if (TRUE_VALUES.has(v)) return true;
  if (FALSE_VALUES.has(v)) return false;
  throw new InvalidFlagError(param, value);
}

export function routeParams(params: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  if (!params || typeof params !== "object") return out;
  for (const [k, v] of Object.entries(params)) {
    if (typeof v === "string") out[k] = v;
  }
  return out;
}

const ClusterId = z.string().uuid();
const RuleId = /^[a-zA-Z_0-9.]+$/;
const ErrorKey = /^[a-zA-Z_0-9]+$/;

export function readClusterId(params: Record<string, string>, name = "cluster"): string {
  const raw = (params[name] ?? "").trim();
  if (!ClusterId.safeParse(raw).success) {
    badRequest("invalid_cluster_id", `invalid cluster ID: '${raw}'`);
  }
  return raw;
}

export function readClusterList(params: Record<string, string>, name = "clusterList"): string[] {
  const raw = (params[name] ?? "").trim();
  const ids = raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  if (ids.length === 0) badRequest("invalid_cluster_list", "cluster list is empty");
  const invalid = ids.filter((id) => !ClusterId.safeParse(id).success);
  if (invalid.length > 0) {
    badRequest("invalid_cluster_list", "cluster list contains invalid cluster IDs", { invalid });
  }
  return ids;
}

export function checkRuleId(ruleId: string): string {
  if (!RuleId.test(ruleId)) badRequest("invalid_rule_id", `invalid rule ID: '${ruleId}'`);
  return ruleId;
}

export function checkErrorKey(errorKey: string): string {
  if (!ErrorKey.test(errorKey)) badRequest("invalid_error_key", `invalid error key: '${errorKey}'`);
  return errorKey;
}

/** Parses a `rule_id|error_key` selector. */
export function readRuleSelector(raw: string): { ruleId: string; errorKey: string } {
  const parts = raw.split("|");
  if (parts.length !== 2) {
    badRequest("invalid_rule_selector", `rule must be given as 'rule_id|error_key': '${raw}'`);
  }
  const [ruleId, errorKey] = parts;
  return { ruleId: checkRuleId(ruleId.trim()), errorKey: checkErrorKey(errorKey.trim()) };
}
