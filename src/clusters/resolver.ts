import type { AggregatorClient } from "../aggregator/client.js";
import { ServiceUnavailableError } from "../errors.js";
import type { Logger } from "../logger.js";
import {
  StatusArchived,
  StatusDeprovisioned,
  type ClusterInfo,
  type MembershipClient,
  type OrgClusters,
} from "../membership/client.js";
import { formatError } from "../util/error-format.js";

export const EXCLUDED_CLUSTER_STATUSES: readonly string[] = [StatusDeprovisioned, StatusArchived];

/**
 * Resolves the clusters of an organization. The membership service is asked
 * first when configured; on failure (or without it) the aggregator's own
 * per-organization listing is used, unless that fallback is disabled.
 * A single call uses exactly one source.
 */
export class ClusterResolver {
  private readonly aggregator: Pick<AggregatorClient, "readClusterIdsForOrg">;
  private readonly membership: MembershipClient | null;
  private readonly useFallback: boolean;
  private readonly log: Logger;

  constructor(opts: {
    aggregator: Pick<AggregatorClient, "readClusterIdsForOrg">;
    membership: MembershipClient | null;
    useFallback: boolean;
    log: Logger;
  }) {
    this.aggregator = opts.aggregator;
    this.membership = opts.membership;
    this.useFallback = opts.useFallback;
    this.log = opts.log;
  }

  async readClusterIdsForOrg(orgId: number): Promise<string[]> {
    const fromMembership = await this.tryMembership(orgId);
    if (fromMembership) {
      this.log.info({ org_id: orgId, clusters: fromMembership.clusters.length }, "cluster IDs retrieved from membership service");
      return fromMembership.clusters.map((c) => c.id);
    }
    this.requireFallback(orgId);
    return this.aggregator.readClusterIdsForOrg(orgId);
  }

  async readClustersForOrg(orgId: number): Promise<OrgClusters> {
    const fromMembership = await this.tryMembership(orgId);
    if (fromMembership) {
      this.log.info({ org_id: orgId, clusters: fromMembership.clusters.length }, "clusters retrieved from membership service");
      return fromMembership;
    }
    this.requireFallback(orgId);

    const ids = await this.aggregator.readClusterIdsForOrg(orgId);
    // No display-name source on this path.
    const clusters: ClusterInfo[] = ids.map((id) => ({ id, display_name: "" }));
    const displayNames = new Map<string, string>(ids.map((id): [string, string] => [id, ""]));
    return { clusters, displayNames };
  }

  private async tryMembership(orgId: number): Promise<OrgClusters | null> {
    if (!this.membership) return null;
    try {
      return await this.membership.clustersForOrg(orgId, EXCLUDED_CLUSTER_STATUSES);
    } catch (err: unknown) {
      this.log.error({ org_id: orgId, err: formatError(err) }, "error accessing membership service");
      return null;
    }
  }

  private requireFallback(orgId: number) {
    if (!this.useFallback) {
      this.log.error({ org_id: orgId }, "membership service unavailable and aggregator fallback is disabled");
      throw new ServiceUnavailableError("membership");
    }
    this.log.info({ org_id: orgId }, "using aggregator fallback for organization clusters");
  }
}
