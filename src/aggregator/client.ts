import type { Backend } from "../backends.js";
import type { Logger } from "../logger.js";
import { callUpstream, decodeJson, expectOk, makeUrlToEndpoint, type UpstreamOptions } from "../upstream/http.js";
import {
  ClusterReports,
  MetainfoEnvelope,
  OrgClustersEnvelope,
  ReportEnvelope,
  RuleOnReportEnvelope,
  type RawRuleHit,
  type ReportMetainfo,
  type ReportResponse,
} from "./schemas.js";
import {
  ClustersForOrganizationEndpoint,
  ReportEndpoint,
  ReportForListOfClustersEndpoint,
  ReportForListOfClustersPayloadEndpoint,
  ReportMetainfoEndpoint,
  RuleEndpoint,
} from "./endpoints.js";

export const JSON_CONTENT_TYPE = "application/json; charset=utf-8";

/**
 * Read-only client for the results aggregator.
 *
 * Every call either resolves with the decoded payload or throws:
 * - `UpstreamStatusError` when the aggregator answered with a non-200 status
 *   (the error handler forwards that answer unchanged),
 * - `ServiceUnavailableError("aggregator")` on transport failure,
 * - `UpstreamDecodeError` when a 200 body is not the expected JSON.
 */
export class AggregatorClient {
  private readonly backend: Backend;
  private readonly http: UpstreamOptions;
  private readonly log: Logger;

  constructor(opts: { backend: Backend; http: UpstreamOptions; log: Logger }) {
    this.backend = opts.backend;
    this.http = opts.http;
    this.log = opts.log;
  }

  async readReport(orgId: number, clusterId: string, userId: string): Promise<ReportResponse> {
    const url = makeUrlToEndpoint(this.backend.baseUrl, ReportEndpoint, orgId, clusterId, userId);
    const body = await this.get(url);
    const { report } = decodeJson(this.backend, ReportEnvelope, body);
    this.log.debug({ org_id: orgId, cluster_id: clusterId, hits: report.reports.length }, "aggregator report read");
    return report;
  }

  async readReportMetainfo(orgId: number, clusterId: string, userId: string): Promise<ReportMetainfo> {
    const url = makeUrlToEndpoint(this.backend.baseUrl, ReportMetainfoEndpoint, orgId, clusterId, userId);
    const body = await this.get(url);
    return decodeJson(this.backend, MetainfoEnvelope, body).metainfo;
  }

  async readReportsForClusterList(orgId: number, clusterIds: string[]): Promise<ClusterReports> {
    const url = makeUrlToEndpoint(
      this.backend.baseUrl,
      ReportForListOfClustersEndpoint,
      orgId,
      clusterIds.join(","),
    );
    const body = await this.get(url);
    const reports = decodeJson(this.backend, ClusterReports, body);
    this.logClusterReports(orgId, reports);
    return reports;
  }

  async readReportsForClusterListFromBody(orgId: number, payload: string): Promise<ClusterReports> {
    const url = makeUrlToEndpoint(this.backend.baseUrl, ReportForListOfClustersPayloadEndpoint, orgId);
    const res = await callUpstream(
      this.backend,
      url,
      { method: "POST", headers: { "content-type": JSON_CONTENT_TYPE }, body: payload },
      this.http,
    );
    expectOk(this.backend, res);
    const reports = decodeJson(this.backend, ClusterReports, res.body);
    this.logClusterReports(orgId, reports);
    return reports;
  }

  async readRuleOnReport(
    orgId: number,
    clusterId: string,
    userId: string,
    ruleId: string,
    errorKey: string,
  ): Promise<RawRuleHit> {
    const url = makeUrlToEndpoint(
      this.backend.baseUrl,
      RuleEndpoint,
      orgId,
      clusterId,
      userId,
      `${ruleId}|${errorKey}`,
    );
    const body = await this.get(url);
    return decodeJson(this.backend, RuleOnReportEnvelope, body).report;
  }

  async readClusterIdsForOrg(orgId: number): Promise<string[]> {
    this.log.info({ org_id: orgId }, "retrieving cluster IDs from aggregator");
    const url = makeUrlToEndpoint(this.backend.baseUrl, ClustersForOrganizationEndpoint, orgId);
    const body = await this.get(url);
    return decodeJson(this.backend, OrgClustersEnvelope, body).clusters;
  }

  private async get(url: string): Promise<Buffer> {
    const res = await callUpstream(this.backend, url, { method: "GET" }, this.http);
    return expectOk(this.backend, res).body;
  }

  private logClusterReports(orgId: number, reports: ClusterReports) {
    this.log.debug(
      {
        org_id: orgId,
        clusters: reports.clusters?.length ?? 0,
        errors: reports.errors?.length ?? 0,
      },
      "aggregator reports for cluster list read",
    );
  }
}
