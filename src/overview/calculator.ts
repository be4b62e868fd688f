import type { AggregatorClient } from "../aggregator/client.js";
import type { RawRuleHit } from "../aggregator/schemas.js";
import type { ContentLookup } from "../content/directory.js";
import { UpstreamStatusError } from "../errors.js";
import type { Logger } from "../logger.js";

export type ClusterOverview = {
  total_risks_hit: number[];
  tags_hit: string[];
};

export type OrgOverview = {
  clusters_hit: number;
  total_risks: number[];
  tags: string[];
};

export type RenderedOverview = {
  clusters_hit: number;
  hit_by_risk: Record<string, number>;
  hit_by_tag: Record<string, number>;
};

type Deps = {
  aggregator: Pick<AggregatorClient, "readReport">;
  content: ContentLookup;
  log: Logger;
};

/**
 * Risk scores and tags of every hit on one cluster that has content.
 * Resolves `null` when the cluster has no report or no hits.
 */
export async function computeClusterOverview(
  deps: Deps,
  orgId: number,
  userId: string,
  clusterId: string,
): Promise<ClusterOverview | null> {
  let hits: RawRuleHit[];
  try {
    hits = (await deps.aggregator.readReport(orgId, clusterId, userId)).reports;
  } catch (err: unknown) {
    if (err instanceof UpstreamStatusError) {
      deps.log.info({ cluster_id: clusterId, status: err.status }, "aggregator has no report for cluster");
      return null;
    }
    throw err;
  }

  if (hits.length === 0) {
    deps.log.info({ cluster_id: clusterId }, "cluster report has no hits, skipping from overview");
    return null;
  }

  const totalRisks: number[] = [];
  const tags: string[] = [];
  for (const hit of hits) {
    // ContentTimeoutError propagates and aborts the whole overview.
    const content = await deps.content.contentFor(hit.component, hit.key);
    if (!content) {
      deps.log.warn({ cluster_id: clusterId, rule_id: hit.component, error_key: hit.key }, "unable to retrieve content for rule");
      continue;
    }
    totalRisks.push(content.total_risk);
    tags.push(...content.tags);
  }

  return { total_risks_hit: totalRisks, tags_hit: tags };
}

export async function computeOrgOverview(
  deps: Deps,
  orgId: number,
  userId: string,
  clusterIds: readonly string[],
): Promise<OrgOverview> {
  const out: OrgOverview = { clusters_hit: 0, total_risks: [], tags: [] };
  for (const clusterId of clusterIds) {
    const overview = await computeClusterOverview(deps, orgId, userId, clusterId);
    if (!overview) continue;
    out.clusters_hit += 1;
    out.total_risks.push(...overview.total_risks_hit);
    out.tags.push(...overview.tags_hit);
  }
  return out;
}

export function renderOverview(overview: OrgOverview): RenderedOverview {
  const hitByRisk: Record<string, number> = {};
  for (const risk of overview.total_risks) {
    hitByRisk[String(risk)] = (hitByRisk[String(risk)] ?? 0) + 1;
  }
  const hitByTag: Record<string, number> = {};
  for (const tag of overview.tags) {
    hitByTag[tag] = (hitByTag[tag] ?? 0) + 1;
  }
  return { clusters_hit: overview.clusters_hit, hit_by_risk: hitByRisk, hit_by_tag: hitByTag };
}
