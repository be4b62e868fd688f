import Fastify, { type FastifyError, type FastifyInstance, type FastifyServerOptions } from "fastify";
import { randomUUID } from "node:crypto";
import { ZodError } from "zod";
import { AggregatorClient } from "./aggregator/client.js";
import {
  DisableRuleForClusterEndpoint,
  DislikeRuleEndpoint,
  EnableRuleForClusterEndpoint,
  LikeRuleEndpoint,
  ResetVoteOnRuleEndpoint,
} from "./aggregator/endpoints.js";
import { ClusterListInBody } from "./aggregator/schemas.js";
import { defineBackends } from "./backends.js";
import { ClusterResolver } from "./clusters/resolver.js";
import type { Env } from "./config.js";
import { RuleContentDirectory } from "./content/directory.js";
import {
  audiencePolicy,
  classifyContent,
  composePolicies,
  enrich,
  filterReportRules,
  internalRulesAllowed,
  reportedRuleCount,
  type InternalRuleAccess,
} from "./content/filter.js";
import { ContentRefresher } from "./content/refresher.js";
import type { RuleGroup } from "./content/schemas.js";
import { PermissionDeniedError, UpstreamStatusError } from "./errors.js";
import { LatestMailbox, readLatest } from "./groups/mailbox.js";
import type { Logger } from "./logger.js";
import { HttpMembershipClient } from "./membership/client.js";
import { computeOrgOverview, renderOverview } from "./overview/calculator.js";
import { createProxyHandler } from "./proxy/dispatcher.js";
import { checkRuleActionParams, dropInternalContent, userIdToPath } from "./proxy/modifiers.js";
import type { FetchLike, UpstreamOptions } from "./upstream/http.js";
import { createAuthResolver, requireIdentity } from "./util/auth.js";
import { formatError } from "./util/error-format.js";
import { badRequest, HttpError, notFound } from "./util/http.js";
import {
  DisabledParam,
  InvalidFlagError,
  OsdEligibleParam,
  parseBoolFlag,
  readClusterId,
  readClusterList,
  readRuleSelector,
  routeParams,
} from "./util/params.js";

export type BuildAppOptions = {
  env: Env;
  // Replaces global fetch for every backend call.
  fetchImpl?: FetchLike;
  logger?: boolean | { level: string };
};

export type Gateway = {
  app: FastifyInstance;
  directory: RuleContentDirectory;
  groups: LatestMailbox<RuleGroup[]>;
  refresher: ContentRefresher;
};

const MAX_PARAM_LENGTH = 2048;

const RULE_ACTIONS: ReadonlyArray<{ action: string; template: string }> = [
  { action: "like", template: LikeRuleEndpoint },
  { action: "dislike", template: DislikeRuleEndpoint },
  { action: "reset_vote", template: ResetVoteOnRuleEndpoint },
  { action: "disable", template: DisableRuleForClusterEndpoint },
  { action: "enable", template: EnableRuleForClusterEndpoint },
];

// A malformed audience flag is not worth failing the request over.
function readOsdEligible(query: unknown, log: Logger): boolean {
  try {
    return parseBoolFlag(query, OsdEligibleParam);
  } catch (err: unknown) {
    if (!(err instanceof InvalidFlagError)) throw err;
    log.warn({ param: err.param, err: err.message }, "ignoring malformed query flag");
    return false;
  }
}

function readIncludeDisabled(query: unknown): boolean {
  try {
    return parseBoolFlag(query, DisabledParam);
  } catch (err: unknown) {
    if (err instanceof InvalidFlagError) badRequest("invalid_query_param", err.message, { param: err.param });
    throw err;
  }
}

export function buildApp(opts: BuildAppOptions): Gateway {
  const { env } = opts;

  const logger: FastifyServerOptions["logger"] = opts.logger ?? { level: env.LOG_LEVEL };
  const app = Fastify({
    logger,
    // Cluster lists and rule selectors travel as single path segments.
    maxParamLength: MAX_PARAM_LENGTH,
    genReqId: (req) => {
      const hdr = req.headers["x-request-id"];
      if (typeof hdr === "string" && hdr.trim().length > 0) return hdr.trim();
      return randomUUID();
    },
  });

  const backends = defineBackends(env);
  const http: UpstreamOptions = { timeoutMs: env.UPSTREAM_TIMEOUT_MS, fetchImpl: opts.fetchImpl };
  const auth = createAuthResolver({
    mode: env.AUTH_MODE,
    jwtHs256Secret: env.AUTH_JWT_HS256_SECRET,
    jwtClockSkewSec: env.AUTH_JWT_CLOCK_SKEW_SEC,
    defaultOrgId: env.AUTH_DEFAULT_ORG_ID,
    defaultAccountNumber: env.AUTH_DEFAULT_ACCOUNT_NUMBER,
  });
  const internal: InternalRuleAccess = {
    enabled: env.ENABLE_INTERNAL_RULES_ORGANIZATIONS,
    allowedOrgIds: new Set(env.INTERNAL_RULES_ORG_IDS),
  };

  const aggregator = new AggregatorClient({ backend: backends.aggregator, http, log: app.log });
  const membership = backends.membership
    ? new HttpMembershipClient({
        backend: backends.membership,
        http,
        token: env.MEMBERSHIP_TOKEN,
        pageSize: env.MEMBERSHIP_PAGE_SIZE,
        log: app.log,
      })
    : null;
  const resolver = new ClusterResolver({
    aggregator,
    membership,
    useFallback: env.USE_ORG_CLUSTERS_FALLBACK,
    log: app.log,
  });
  const directory = new RuleContentDirectory({ waitTimeoutMs: env.CONTENT_WAIT_TIMEOUT_MS });
  const groups = new LatestMailbox<RuleGroup[]>();
  const refresher = new ContentRefresher({
    backend: backends.content,
    http,
    directory,
    groups,
    intervalMs: env.CONTENT_REFRESH_INTERVAL_MS,
    log: app.log,
  });

  app.setErrorHandler((err: FastifyError, req, reply) => {
    if (err instanceof ZodError) {
      return reply.code(400).send({
        error: "invalid_request",
        issues: err.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
      });
    }
    if (err instanceof UpstreamStatusError) {
      req.log.info({ backend: err.backend, status: err.status }, "forwarding upstream error response");
      if (err.contentType) reply.header("content-type", err.contentType);
      return reply.code(err.status).send(err.body);
    }
    if (err instanceof HttpError) {
      if (err.statusCode >= 500) req.log.error({ err: formatError(err), code: err.code }, "request failed");
      return reply.code(err.statusCode).send({ error: err.code, message: err.message, details: err.details ?? undefined });
    }
    // Fastify's own client errors (bad JSON body, unsupported media type).
    if (typeof err.statusCode === "number" && err.statusCode >= 400 && err.statusCode < 500) {
      return reply.code(err.statusCode).send({ error: "invalid_request", message: err.message });
    }
    req.log.error({ err: formatError(err) }, "unhandled error");
    return reply.code(500).send({ error: "internal_error", message: "internal error" });
  });

  // Proxied bodies are forwarded as raw bytes whatever their content type.
  app.addContentTypeParser("*", { parseAs: "buffer" }, (_req, body, done) => {
    done(null, body);
  });

  app.addHook("onRequest", async (req, reply) => {
    reply.header("x-request-id", req.id);
  });

  app.get("/health", async () => ({ ok: true }));

  app.register(
    async (r) => {
      r.get("/report/:cluster", async (req) => {
        const clusterId = readClusterId(routeParams(req.params));
        const identity = requireIdentity(auth, req.headers);
        const includeDisabled = readIncludeDisabled(req.query);
        const osdEligibleOnly = readOsdEligible(req.query, req.log);

        const report = await aggregator.readReport(identity.org_id, clusterId, identity.account_number);
        const result = await filterReportRules(report.reports, directory, {
          includeDisabled,
          osdEligibleOnly,
          orgId: identity.org_id,
          internal,
        });
        const count = reportedRuleCount(result);
        if (count === 0 && result.noContentCount > 0) {
          req.log.error(
            { cluster_id: clusterId, no_content: result.noContentCount },
            "rules are hitting but none of them has content",
          );
        }
        req.log.info(
          {
            cluster_id: clusterId,
            visible: result.visible.length,
            no_content: result.noContentCount,
            disabled: result.disabledCount,
          },
          "report filtered",
        );
        return {
          status: "ok",
          report: {
            meta: { last_checked_at: report.meta.last_checked_at, count },
            data: result.visible,
          },
        };
      });

      r.get("/report/:cluster/metainfo", async (req) => {
        const clusterId = readClusterId(routeParams(req.params));
        const identity = requireIdentity(auth, req.headers);
        const metainfo = await aggregator.readReportMetainfo(identity.org_id, clusterId, identity.account_number);
        return { status: "ok", metainfo };
      });

      r.get("/reports/:clusterList", async (req) => {
        const clusterIds = readClusterList(routeParams(req.params));
        const identity = requireIdentity(auth, req.headers);
        return aggregator.readReportsForClusterList(identity.org_id, clusterIds);
      });

      r.post("/reports", async (req) => {
        const identity = requireIdentity(auth, req.headers);
        const body = ClusterListInBody.parse(req.body);
        return aggregator.readReportsForClusterListFromBody(identity.org_id, JSON.stringify(body));
      });

      r.get("/report/:cluster/rule/:rule", async (req) => {
        const params = routeParams(req.params);
        const clusterId = readClusterId(params);
        const { ruleId, errorKey } = readRuleSelector(params.rule ?? "");
        const identity = requireIdentity(auth, req.headers);
        const osdEligibleOnly = readOsdEligible(req.query, req.log);

        const hit = await aggregator.readRuleOnReport(
          identity.org_id,
          clusterId,
          identity.account_number,
          ruleId,
          errorKey,
        );
        const content = await directory.contentFor(hit.component, hit.key);
        if (!content) notFound(`rule '${ruleId}|${errorKey}' was not found`);
        if (classifyContent(hit, content, composePolicies(audiencePolicy(osdEligibleOnly))) !== "visible") {
          notFound(`rule '${ruleId}|${errorKey}' was not found`);
        }
        if (content.internal && !internalRulesAllowed(internal, identity.org_id)) {
          throw new PermissionDeniedError("this organization is not allowed to access internal rules");
        }
        return { status: "ok", report: enrich(hit, content) };
      });

      r.get("/clusters", async (req) => {
        const identity = requireIdentity(auth, req.headers);
        const { clusters, displayNames } = await resolver.readClustersForOrg(identity.org_id);
        return {
          status: "ok",
          clusters: clusters.map((c) => ({
            cluster_id: c.id,
            display_name: displayNames.get(c.id) ?? c.display_name,
          })),
        };
      });

      r.get("/org_overview", async (req) => {
        const identity = requireIdentity(auth, req.headers);
        const clusterIds = await resolver.readClusterIdsForOrg(identity.org_id);
        const overview = await computeOrgOverview(
          { aggregator, content: directory, log: req.log },
          identity.org_id,
          identity.account_number,
          clusterIds,
        );
        return { status: "ok", overview: renderOverview(overview) };
      });

      r.get("/groups", async () => ({ status: "ok", groups: readLatest(groups) }));

      for (const { action, template } of RULE_ACTIONS) {
        r.put(
          `/clusters/:cluster/rules/:rule_id/error_key/:error_key/${action}`,
          createProxyHandler(backends.aggregator, {
            apiPrefix: env.API_PREFIX,
            http,
            requestModifiers: [checkRuleActionParams, userIdToPath(auth, template)],
          }),
        );
      }

      r.get(
        "/content",
        createProxyHandler(backends.content, {
          apiPrefix: env.API_PREFIX,
          http,
          responseModifiers: [dropInternalContent(auth, internal)],
        }),
      );
    },
    { prefix: env.API_PREFIX },
  );

  return { app, directory, groups, refresher };
}
