import type { RawRuleHit } from "../aggregator/schemas.js";
import type { ContentLookup } from "./directory.js";
import type { RuleContent } from "./schemas.js";

export type FilterOutcome = "visible" | "disabled" | "no_content";

export type EnrichedRule = {
  rule_id: string;
  error_key: string;
  created_at: string | null;
  description: string;
  generic: string;
  reason: string;
  resolution: string;
  more_info: string;
  total_risk: number;
  likelihood: number;
  impact: number;
  publish_date: string;
  tags: string[];
  internal: boolean;
  disabled: boolean;
  disable_feedback: string;
  disabled_at: string | null;
  user_vote: number;
  extra_data: unknown;
};

/** A policy that can reject a hit before its content is looked up. */
export type HitPolicy = {
  stage: "hit";
  name: string;
  admits: (hit: RawRuleHit) => boolean;
};

/** A policy that judges a hit together with its content. */
export type ContentPolicy = {
  stage: "content";
  name: string;
  admits: (hit: RawRuleHit, content: RuleContent) => boolean;
};

export type FilterPolicies = {
  hit: readonly HitPolicy[];
  content: readonly ContentPolicy[];
};

export type FilterResult = {
  visible: EnrichedRule[];
  noContentCount: number;
  disabledCount: number;
};

export type InternalRuleAccess = {
  enabled: boolean;
  allowedOrgIds: ReadonlySet<number>;
};

export function internalRulesAllowed(access: InternalRuleAccess, orgId: number): boolean {
  return access.enabled && access.allowedOrgIds.has(orgId);
}

export function disabledPolicy(includeDisabled: boolean): HitPolicy {
  return {
    stage: "hit",
    name: "disabled",
    admits: (hit) => includeDisabled || !hit.disabled,
  };
}

export function audiencePolicy(eligibleOnly: boolean): ContentPolicy {
  return {
    stage: "content",
    name: "audience",
    admits: (_hit, content) => !eligibleOnly || content.osd_customer,
  };
}

export function internalPolicy(access: InternalRuleAccess, orgId: number): ContentPolicy {
  const allowed = internalRulesAllowed(access, orgId);
  return {
    stage: "content",
    name: "internal",
    admits: (_hit, content) => allowed || !content.internal,
  };
}

export function composePolicies(...policies: Array<HitPolicy | ContentPolicy | FilterPolicies>): FilterPolicies {
  const hit: HitPolicy[] = [];
  const content: ContentPolicy[] = [];
  for (const p of policies) {
    if (!("stage" in p)) {
      hit.push(...p.hit);
      content.push(...p.content);
    } else if (p.stage === "hit") {
      hit.push(p);
    } else {
      content.push(p);
    }
  }
  return { hit, content };
}

/** First stage: `"disabled"` when a hit policy rejects the hit, otherwise `null`. */
export function classifyHit(hit: RawRuleHit, policies: FilterPolicies): Extract<FilterOutcome, "disabled"> | null {
  return policies.hit.every((p) => p.admits(hit)) ? null : "disabled";
}

/** Second stage: missing content and content rejected by any policy are both `"no_content"`. */
export function classifyContent(
  hit: RawRuleHit,
  content: RuleContent | null,
  policies: FilterPolicies,
): Exclude<FilterOutcome, "disabled"> {
  if (!content) return "no_content";
  return policies.content.every((p) => p.admits(hit, content)) ? "visible" : "no_content";
}

export function enrich(hit: RawRuleHit, content: RuleContent): EnrichedRule {
  return {
    rule_id: hit.component,
    error_key: hit.key,
    created_at: hit.created_at,
    description: content.description,
    generic: content.generic,
    reason: content.reason,
    resolution: content.resolution,
    more_info: content.more_info,
    total_risk: content.total_risk,
    likelihood: content.likelihood,
    impact: content.impact,
    publish_date: content.publish_date,
    tags: [...content.tags],
    internal: content.internal,
    disabled: hit.disabled,
    disable_feedback: hit.disable_feedback,
    disabled_at: hit.disabled_at,
    user_vote: hit.user_vote,
    extra_data: hit.details ?? null,
  };
}

/**
 * Walks the hits in order and sorts each into visible, disabled or
 * no-content. Content is not looked up for hits rejected at the first stage.
 * A lookup failure (e.g. `ContentTimeoutError`) rejects the whole call; no
 * partial result is returned.
 */
export async function filterRules(
  hits: readonly RawRuleHit[],
  lookup: ContentLookup,
  policies: FilterPolicies,
): Promise<FilterResult> {
  const visible: EnrichedRule[] = [];
  let noContentCount = 0;
  let disabledCount = 0;

  for (const hit of hits) {
    if (classifyHit(hit, policies) === "disabled") {
      disabledCount += 1;
      continue;
    }
    const content = await lookup.contentFor(hit.component, hit.key);
    if (content === null || classifyContent(hit, content, policies) === "no_content") {
      noContentCount += 1;
      continue;
    }
    visible.push(enrich(hit, content));
  }

  return { visible, noContentCount, disabledCount };
}

export type ReportFilterOptions = {
  osdEligibleOnly: boolean;
  includeDisabled: boolean;
  orgId: number;
  internal: InternalRuleAccess;
};

export function reportPolicies(opts: ReportFilterOptions): FilterPolicies {
  return composePolicies(
    disabledPolicy(opts.includeDisabled),
    audiencePolicy(opts.osdEligibleOnly),
    internalPolicy(opts.internal, opts.orgId),
  );
}

export function filterReportRules(
  hits: readonly RawRuleHit[],
  lookup: ContentLookup,
  opts: ReportFilterOptions,
): Promise<FilterResult> {
  return filterRules(hits, lookup, reportPolicies(opts));
}

/**
 * Rule count reported to the client. When rules are hitting but none of them
 * has content (and none is disabled), the report must read as "no issues", so
 * the count is forced to zero.
 */
export function reportedRuleCount(result: FilterResult): number {
  const visible = result.visible.length;
  if (visible === 0 && result.noContentCount > 0 && result.disabledCount === 0) return 0;
  return visible + result.noContentCount;
}
