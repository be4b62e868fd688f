import { z } from "zod";
import type { Backend } from "../backends.js";
import type { Logger } from "../logger.js";
import { callUpstream, decodeJson, expectOk, makeUrlToEndpoint, type UpstreamOptions } from "../upstream/http.js";

export const StatusDeprovisioned = "Deprovisioned";
export const StatusArchived = "Archived";

export type ClusterInfo = {
  id: string;
  display_name: string;
  status?: string;
};

export type OrgClusters = {
  clusters: ClusterInfo[];
  displayNames: Map<string, string>;
};

export interface MembershipClient {
  clustersForOrg(orgId: number, excludedStatuses: readonly string[]): Promise<OrgClusters>;
}

const OrgClustersEndpoint = "organizations/{org_id}/clusters";

const ClusterPage = z.object({
  items: z
    .array(
      z.object({
        cluster_id: z.string().nullable().optional(),
        display_name: z.string().nullable().optional(),
        status: z.string().nullable().optional(),
      }),
    )
    .default([]),
  page: z.number().int().default(1),
  size: z.number().int().default(0),
  total: z.number().int().default(0),
});

export class HttpMembershipClient implements MembershipClient {
  private readonly backend: Backend;
  private readonly http: UpstreamOptions;
  private readonly token: string | null;
  private readonly pageSize: number;
  private readonly log: Logger;

  constructor(opts: { backend: Backend; http: UpstreamOptions; token?: string; pageSize: number; log: Logger }) {
    this.backend = opts.backend;
    this.http = opts.http;
    this.token = opts.token?.trim() || null;
    this.pageSize = Math.max(1, Math.trunc(opts.pageSize));
    this.log = opts.log;
  }

  async clustersForOrg(orgId: number, excludedStatuses: readonly string[]): Promise<OrgClusters> {
    const excluded = new Set(excludedStatuses.map((s) => s.toLowerCase()));
    const clusters: ClusterInfo[] = [];
    const displayNames = new Map<string, string>();
    const base = makeUrlToEndpoint(this.backend.baseUrl, OrgClustersEndpoint, orgId);
    const headers: Record<string, string> = { accept: "application/json" };
    if (this.token) headers.authorization = `Bearer ${this.token}`;

    let seen = 0;
    for (let page = 1; ; page++) {
      const url = `${base}?page=${page}&size=${this.pageSize}`;
      const res = expectOk(this.backend, await callUpstream(this.backend, url, { method: "GET", headers }, this.http));
      const body = decodeJson(this.backend, ClusterPage, res.body);
      seen += body.items.length;

      for (const item of body.items) {
        const id = item.cluster_id?.trim();
        if (!id) continue;
        const status = item.status ?? undefined;
        if (status && excluded.has(status.toLowerCase())) continue;
        const displayName = item.display_name?.trim() || id;
        clusters.push({ id, display_name: displayName, status });
        displayNames.set(id, displayName);
      }

      if (body.items.length < this.pageSize || seen >= body.total) break;
    }

    this.log.debug({ org_id: orgId, clusters: clusters.length, listed: seen }, "membership clusters read");
    return { clusters, displayNames };
  }
}
