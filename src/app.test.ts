import { afterEach, describe, expect, it } from "vitest";
import { buildApp, type Gateway } from "./app.js";
import { loadEnv } from "./config.js";
import { ServiceUnavailableError } from "./errors.js";
import { CLUSTER_1, CLUSTER_2, CLUSTER_3, jsonResponse, ruleContent, stubFetch } from "./testing/fixtures.js";

const AGG = "http://aggregator.test/api/v1";
const CONTENT = "http://content.test/api/v1";

const env = loadEnv({
  AGGREGATOR_BASE_ENDPOINT: AGG,
  CONTENT_BASE_ENDPOINT: CONTENT,
  AUTH_MODE: "identity_header",
  ENABLE_INTERNAL_RULES_ORGANIZATIONS: "true",
  INTERNAL_RULES_ORGANIZATIONS: "42",
  CONTENT_WAIT_TIMEOUT_MS: "20",
});

function identity(orgId: number, accountNumber = "1234"): string {
  return Buffer.from(JSON.stringify({ identity: { account_number: accountNumber, org_id: String(orgId) } })).toString(
    "base64",
  );
}

const asOrg7 = { "x-identity": identity(7) };
const asOrg42 = { "x-identity": identity(42) };

const reportBody = {
  status: "ok",
  report: {
    meta: { count: 3, last_checked_at: "2024-03-01T10:00:00Z" },
    reports: [
      { component: "ccx_rules.nodes.report", key: "NODES_MINIMUM" },
      { component: "ccx_rules.sap.report", key: "SAP_EGRESS", disabled: true },
      { component: "ccx_rules.unknown.report", key: "UNKNOWN" },
    ],
  },
};

let gateway: Gateway | null = null;

function start(fetchImpl: ReturnType<typeof stubFetch>, loadContent = true): Gateway {
  gateway = buildApp({ env, fetchImpl, logger: false });
  if (loadContent) {
    gateway.directory.load([
      ruleContent("ccx_rules.nodes", "NODES_MINIMUM", { total_risk: 2, tags: ["performance"] }),
      ruleContent("ccx_rules.sap", "SAP_EGRESS", { total_risk: 3, tags: ["security"], osd_customer: true }),
      ruleContent("ccx_rules.debug", "DEBUG_ONLY", { total_risk: 1, internal: true }),
    ]);
  }
  return gateway;
}

afterEach(async () => {
  await gateway?.app.close();
  gateway = null;
});

describe("service endpoints", () => {
  it("answers health checks outside the prefix", async () => {
    const { app } = start(stubFetch({}));

    const res = await app.inject({ method: "GET", url: "/health" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true });
  });

  it("echoes the request id", async () => {
    const { app } = start(stubFetch({}));

    const res = await app.inject({ method: "GET", url: "/health", headers: { "x-request-id": "req-test-1" } });

    expect(res.headers["x-request-id"]).toBe("req-test-1");
  });

  it("requires an identity", async () => {
    const { app } = start(stubFetch({}));

    const res = await app.inject({ method: "GET", url: `/api/v1/report/${CLUSTER_1}` });

    expect(res.statusCode).toBe(401);
    expect(res.json()).toMatchObject({ error: "missing_identity" });
  });
});

describe("GET /report/:cluster", () => {
  const reportUrl = `GET ${AGG}/organizations/7/clusters/${CLUSTER_1}/users/1234/report`;

  it("returns the filtered report", async () => {
    const { app } = start(stubFetch({ [reportUrl]: () => jsonResponse(200, reportBody) }));

    const res = await app.inject({ method: "GET", url: `/api/v1/report/${CLUSTER_1}`, headers: asOrg7 });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.status).toBe("ok");
    expect(body.report.meta).toEqual({ last_checked_at: "2024-03-01T10:00:00Z", count: 2 });
    expect(body.report.data).toHaveLength(1);
    expect(body.report.data[0]).toMatchObject({
      rule_id: "ccx_rules.nodes.report",
      error_key: "NODES_MINIMUM",
      total_risk: 2,
      tags: ["performance"],
    });
  });

  it("includes disabled rules on request", async () => {
    const { app } = start(stubFetch({ [reportUrl]: () => jsonResponse(200, reportBody) }));

    const res = await app.inject({ method: "GET", url: `/api/v1/report/${CLUSTER_1}?disabled=true`, headers: asOrg7 });

    expect(res.json().report.meta.count).toBe(3);
    expect(res.json().report.data.map((r: { error_key: string }) => r.error_key)).toEqual(["NODES_MINIMUM", "SAP_EGRESS"]);
  });

  it("rejects a malformed disabled flag", async () => {
    const { app } = start(stubFetch({ [reportUrl]: () => jsonResponse(200, reportBody) }));

    const res = await app.inject({ method: "GET", url: `/api/v1/report/${CLUSTER_1}?disabled=maybe`, headers: asOrg7 });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ error: "invalid_query_param", details: { param: "disabled" } });
  });

  it("ignores a malformed audience flag", async () => {
    const { app } = start(stubFetch({ [reportUrl]: () => jsonResponse(200, reportBody) }));

    const res = await app.inject({
      method: "GET",
      url: `/api/v1/report/${CLUSTER_1}?osd_eligible=maybe`,
      headers: asOrg7,
    });

    expect(res.statusCode).toBe(200);
    expect(res.json().report.data).toHaveLength(1);
  });

  it("rejects a cluster id that is not a UUID", async () => {
    const { app } = start(stubFetch({}));

    const res = await app.inject({ method: "GET", url: "/api/v1/report/cluster-one", headers: asOrg7 });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ error: "invalid_cluster_id" });
  });

  it("forwards an aggregator error answer verbatim", async () => {
    const { app } = start(
      stubFetch({
        [reportUrl]: () =>
          new Response('{"status":"Item not found"}', { status: 404, headers: { "content-type": "application/json" } }),
      }),
    );

    const res = await app.inject({ method: "GET", url: `/api/v1/report/${CLUSTER_1}`, headers: asOrg7 });

    expect(res.statusCode).toBe(404);
    expect(res.body).toBe('{"status":"Item not found"}');
    expect(res.headers["content-type"]).toBe("application/json");
  });

  it("reports an unreachable aggregator", async () => {
    const { app } = start(stubFetch({}));

    const res = await app.inject({ method: "GET", url: `/api/v1/report/${CLUSTER_1}`, headers: asOrg7 });

    expect(res.statusCode).toBe(503);
    expect(res.json()).toEqual({ error: "aggregator_service_unavailable", message: "Aggregator service is unavailable" });
  });

  it("reports content that is not ready", async () => {
    const { app } = start(stubFetch({ [reportUrl]: () => jsonResponse(200, reportBody) }), false);

    const res = await app.inject({ method: "GET", url: `/api/v1/report/${CLUSTER_1}`, headers: asOrg7 });

    expect(res.statusCode).toBe(503);
    expect(res.json()).toMatchObject({ error: "content_timeout", details: { waited_ms: 20 } });
  });
});

describe("GET /report/:cluster/metainfo", () => {
  it("wraps the aggregator metainfo", async () => {
    const { app } = start(
      stubFetch({
        [`GET ${AGG}/organizations/7/clusters/${CLUSTER_1}/users/1234/report/info`]: () =>
          jsonResponse(200, {
            status: "ok",
            metainfo: { count: 3, last_checked_at: "2024-03-01T10:00:00Z", stored_at: "2024-03-01T10:00:05Z" },
          }),
      }),
    );

    const res = await app.inject({ method: "GET", url: `/api/v1/report/${CLUSTER_1}/metainfo`, headers: asOrg7 });

    expect(res.json()).toEqual({
      status: "ok",
      metainfo: { count: 3, last_checked_at: "2024-03-01T10:00:00Z", stored_at: "2024-03-01T10:00:05Z" },
    });
  });
});

describe("GET /report/:cluster/rule/:rule", () => {
  function ruleUrl(orgId: number, selector: string): string {
    return `GET ${AGG}/organizations/${orgId}/clusters/${CLUSTER_1}/users/1234/rules/${selector}`;
  }

  it("returns one enriched rule", async () => {
    const { app } = start(
      stubFetch({
        [ruleUrl(7, "ccx_rules.nodes%7CNODES_MINIMUM")]: () =>
          jsonResponse(200, { status: "ok", report: { component: "ccx_rules.nodes", key: "NODES_MINIMUM" } }),
      }),
    );

    const res = await app.inject({
      method: "GET",
      url: `/api/v1/report/${CLUSTER_1}/rule/ccx_rules.nodes%7CNODES_MINIMUM`,
      headers: asOrg7,
    });

    expect(res.statusCode).toBe(200);
    expect(res.json().report).toMatchObject({ rule_id: "ccx_rules.nodes", error_key: "NODES_MINIMUM", total_risk: 2 });
  });

  it("answers 404 for a rule without content", async () => {
    const { app } = start(
      stubFetch({
        [ruleUrl(7, "ccx_rules.unknown%7CUNKNOWN")]: () =>
          jsonResponse(200, { status: "ok", report: { component: "ccx_rules.unknown", key: "UNKNOWN" } }),
      }),
    );

    const res = await app.inject({
      method: "GET",
      url: `/api/v1/report/${CLUSTER_1}/rule/ccx_rules.unknown%7CUNKNOWN`,
      headers: asOrg7,
    });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toMatchObject({ error: "not_found" });
  });

  it("answers 404 for a rule outside the requested audience", async () => {
    const { app } = start(
      stubFetch({
        [ruleUrl(7, "ccx_rules.nodes%7CNODES_MINIMUM")]: () =>
          jsonResponse(200, { status: "ok", report: { component: "ccx_rules.nodes", key: "NODES_MINIMUM" } }),
      }),
    );

    const res = await app.inject({
      method: "GET",
      url: `/api/v1/report/${CLUSTER_1}/rule/ccx_rules.nodes%7CNODES_MINIMUM?osd_eligible=true`,
      headers: asOrg7,
    });

    expect(res.statusCode).toBe(404);
  });

  it("guards internal rules", async () => {
    const body = { status: "ok", report: { component: "ccx_rules.debug", key: "DEBUG_ONLY" } };
    const { app } = start(
      stubFetch({
        [ruleUrl(7, "ccx_rules.debug%7CDEBUG_ONLY")]: () => jsonResponse(200, body),
        [ruleUrl(42, "ccx_rules.debug%7CDEBUG_ONLY")]: () => jsonResponse(200, body),
      }),
    );
    const url = `/api/v1/report/${CLUSTER_1}/rule/ccx_rules.debug%7CDEBUG_ONLY`;

    const denied = await app.inject({ method: "GET", url, headers: asOrg7 });
    const allowed = await app.inject({ method: "GET", url, headers: asOrg42 });

    expect(denied.statusCode).toBe(403);
    expect(denied.json()).toMatchObject({ error: "permission_denied" });
    expect(allowed.statusCode).toBe(200);
    expect(allowed.json().report).toMatchObject({ internal: true });
  });

  it("answers 404 rather than 403 for an internal rule outside the requested audience", async () => {
    const { app } = start(
      stubFetch({
        [ruleUrl(7, "ccx_rules.debug%7CDEBUG_ONLY")]: () =>
          jsonResponse(200, { status: "ok", report: { component: "ccx_rules.debug", key: "DEBUG_ONLY" } }),
      }),
    );

    const res = await app.inject({
      method: "GET",
      url: `/api/v1/report/${CLUSTER_1}/rule/ccx_rules.debug%7CDEBUG_ONLY?osd_eligible=true`,
      headers: asOrg7,
    });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toMatchObject({ error: "not_found" });
  });

  it("rejects a malformed selector", async () => {
    const { app } = start(stubFetch({}));

    const res = await app.inject({ method: "GET", url: `/api/v1/report/${CLUSTER_1}/rule/ccx_rules.nodes`, headers: asOrg7 });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ error: "invalid_rule_selector" });
  });
});

describe("multi-cluster reports", () => {
  it("passes the aggregator answer for a cluster list through", async () => {
    const upstream = { status: "ok", clusters: [CLUSTER_1, CLUSTER_2], errors: [], reports: {} };
    const { app } = start(
      stubFetch({
        [`GET ${AGG}/organizations/7/clusters/${CLUSTER_1}%2C${CLUSTER_2}/reports`]: () => jsonResponse(200, upstream),
      }),
    );

    const res = await app.inject({ method: "GET", url: `/api/v1/reports/${CLUSTER_1},${CLUSTER_2}`, headers: asOrg7 });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual(upstream);
  });

  it("accepts lists longer than the default path parameter limit", async () => {
    const upstream = { status: "ok", clusters: [CLUSTER_1, CLUSTER_2, CLUSTER_3], errors: [], reports: {} };
    const fetchImpl = stubFetch({
      [`GET ${AGG}/organizations/7/clusters/${CLUSTER_1}%2C${CLUSTER_2}%2C${CLUSTER_3}/reports`]: () =>
        jsonResponse(200, upstream),
    });
    const { app } = start(fetchImpl);

    const res = await app.inject({
      method: "GET",
      url: `/api/v1/reports/${CLUSTER_1},${CLUSTER_2},${CLUSTER_3}`,
      headers: asOrg7,
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual(upstream);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it("posts a validated cluster list", async () => {
    const upstream = { status: "ok", clusters: [CLUSTER_1], reports: {} };
    const fetchImpl = stubFetch({
      [`POST ${AGG}/organizations/7/clusters/reports`]: () => jsonResponse(200, upstream),
    });
    const { app } = start(fetchImpl);

    const res = await app.inject({
      method: "POST",
      url: "/api/v1/reports",
      headers: asOrg7,
      payload: { clusters: [CLUSTER_1] },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual(upstream);
    expect(fetchImpl.mock.calls[0][1]?.body).toBe(JSON.stringify({ clusters: [CLUSTER_1] }));
  });

  it("rejects a posted list with invalid ids", async () => {
    const { app } = start(stubFetch({}));

    const res = await app.inject({
      method: "POST",
      url: "/api/v1/reports",
      headers: asOrg7,
      payload: { clusters: ["bogus"] },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ error: "invalid_request" });
  });
});

describe("organization endpoints", () => {
  const clustersUrl = `GET ${AGG}/organizations/7/clusters`;

  it("lists clusters through the aggregator fallback", async () => {
    const { app } = start(
      stubFetch({ [clustersUrl]: () => jsonResponse(200, { status: "ok", clusters: [CLUSTER_1, CLUSTER_2] }) }),
    );

    const res = await app.inject({ method: "GET", url: "/api/v1/clusters", headers: asOrg7 });

    expect(res.json()).toEqual({
      status: "ok",
      clusters: [
        { cluster_id: CLUSTER_1, display_name: "" },
        { cluster_id: CLUSTER_2, display_name: "" },
      ],
    });
  });

  it("computes the organization overview", async () => {
    const { app } = start(
      stubFetch({
        [clustersUrl]: () => jsonResponse(200, { status: "ok", clusters: [CLUSTER_1, CLUSTER_2] }),
        [`GET ${AGG}/organizations/7/clusters/${CLUSTER_1}/users/1234/report`]: () => jsonResponse(200, reportBody),
        [`GET ${AGG}/organizations/7/clusters/${CLUSTER_2}/users/1234/report`]: () =>
          jsonResponse(404, { status: "Item not found" }),
      }),
    );

    const res = await app.inject({ method: "GET", url: "/api/v1/org_overview", headers: asOrg7 });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      status: "ok",
      overview: {
        clusters_hit: 1,
        hit_by_risk: { "2": 1, "3": 1 },
        hit_by_tag: { performance: 1, security: 1 },
      },
    });
  });
});

describe("GET /groups", () => {
  it("serves the latest published groups or the stored failure", async () => {
    const { app, groups } = start(stubFetch({}));

    const empty = await app.inject({ method: "GET", url: "/api/v1/groups" });
    expect(empty.json()).toEqual({ status: "ok", groups: [] });

    groups.publish([{ title: "Security", description: "Exposure risks", tags: ["security"] }]);
    const published = await app.inject({ method: "GET", url: "/api/v1/groups" });
    expect(published.json()).toEqual({
      status: "ok",
      groups: [{ title: "Security", description: "Exposure risks", tags: ["security"] }],
    });

    groups.fail(new ServiceUnavailableError("content"));
    const failed = await app.inject({ method: "GET", url: "/api/v1/groups" });
    expect(failed.statusCode).toBe(503);
    expect(failed.json()).toMatchObject({ error: "content_service_unavailable" });
  });
});

describe("proxied routes", () => {
  it("sends rule votes to the aggregator under the caller's account", async () => {
    const fetchImpl = stubFetch({
      [`PUT ${AGG}/clusters/${CLUSTER_1}/rules/ccx_rules.nodes/error_key/NODES_MINIMUM/users/1234/like`]: () =>
        jsonResponse(200, { status: "ok" }),
    });
    const { app } = start(fetchImpl);

    const res = await app.inject({
      method: "PUT",
      url: `/api/v1/clusters/${CLUSTER_1}/rules/ccx_rules.nodes/error_key/NODES_MINIMUM/like`,
      headers: asOrg7,
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: "ok" });
  });

  it("validates rule action parameters before forwarding", async () => {
    const fetchImpl = stubFetch({});
    const { app } = start(fetchImpl);

    const res = await app.inject({
      method: "PUT",
      url: `/api/v1/clusters/${CLUSTER_1}/rules/ccx_rules.nodes/error_key/BAD-KEY/disable`,
      headers: asOrg7,
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ error: "invalid_error_key" });
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("strips internal rules from the content listing for other organizations", async () => {
    const listing = {
      status: "ok",
      rules: [
        { rule_id: "ccx_rules.nodes", error_key: "NODES_MINIMUM", internal: false },
        { rule_id: "ccx_rules.debug", error_key: "DEBUG_ONLY", internal: true },
      ],
    };
    const { app } = start(stubFetch({ [`GET ${CONTENT}/content`]: () => jsonResponse(200, listing) }));

    const other = await app.inject({ method: "GET", url: "/api/v1/content", headers: asOrg7 });
    const allowed = await app.inject({ method: "GET", url: "/api/v1/content", headers: asOrg42 });

    expect(other.json().rules.map((r: { rule_id: string }) => r.rule_id)).toEqual(["ccx_rules.nodes"]);
    expect(allowed.json()).toEqual(listing);
  });

  it("reports an unreachable content service", async () => {
    const { app } = start(stubFetch({}));

    const res = await app.inject({ method: "GET", url: "/api/v1/content", headers: asOrg7 });

    expect(res.statusCode).toBe(503);
    expect(res.json()).toMatchObject({ error: "content_service_unavailable" });
  });
});
