import { z } from "zod";
import { UpstreamDecodeError } from "../errors.js";
import { internalRulesAllowed, type InternalRuleAccess } from "../content/filter.js";
import { requireIdentity, type AuthResolver } from "../util/auth.js";
import { HttpError } from "../util/http.js";
import { checkErrorKey, checkRuleId, readClusterId } from "../util/params.js";
import type { RequestModifier, ResponseModifier } from "./dispatcher.js";

/** Fills `{name}` placeholders from `vars`, URL-encoding each value. */
export function fillTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{([^}]+)\}/g, (_m, name: string) => {
    const v = vars[name];
    if (v === undefined || v.length === 0) {
      throw new HttpError(400, "invalid_params", `missing path parameter: ${name}`);
    }
    return encodeURIComponent(v);
  });
}

function queryOf(path: string): string {
  const i = path.indexOf("?");
  return i >= 0 ? path.slice(i) : "";
}

/**
 * Rewrites the path to `template`, filled from the route parameters plus the
 * caller's account number as `user_id`.
 */
export function userIdToPath(auth: AuthResolver, template: string): RequestModifier {
  return (req) => {
    const identity = requireIdentity(auth, req.headers);
    const vars = { ...req.params, user_id: identity.account_number };
    return { ...req, path: `/${fillTemplate(template, vars)}${queryOf(req.path)}` };
  };
}

const ContentListing = z
  .object({
    rules: z.array(z.object({ internal: z.boolean().optional() }).passthrough()),
  })
  .passthrough();

/** Removes internal rules from a content listing unless the caller may see them. */
export function dropInternalContent(auth: AuthResolver, access: InternalRuleAccess): ResponseModifier {
  return (res, req) => {
    if (res.status !== 200) return res;
    const identity = requireIdentity(auth, req.headers);
    if (internalRulesAllowed(access, identity.org_id)) return res;

    let raw: unknown;
    try {
      raw = JSON.parse(res.body.toString("utf8"));
    } catch (err: unknown) {
      throw new UpstreamDecodeError("content", "body is not valid JSON", err);
    }
    const parsed = ContentListing.safeParse(raw);
    if (!parsed.success) {
      throw new UpstreamDecodeError("content", "content listing has no rules array", parsed.error);
    }
    const rules = parsed.data.rules.filter((r) => r.internal !== true);
    const body = Buffer.from(JSON.stringify({ ...parsed.data, rules }), "utf8");
    return { ...res, body };
  };
}

/** Rejects rule-action requests whose cluster, rule or error key parameters are malformed. */
export const checkRuleActionParams: RequestModifier = (req) => {
  readClusterId(req.params);
  checkRuleId(req.params.rule_id ?? "");
  checkErrorKey(req.params.error_key ?? "");
  return req;
};
