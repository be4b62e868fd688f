import "dotenv/config";
import { buildApp } from "./app.js";
import { loadEnv } from "./config.js";

const env = loadEnv();
const { app, refresher } = buildApp({ env });

app.log.info(
  {
    app_env: env.APP_ENV,
    api_prefix: env.API_PREFIX,
    aggregator: env.AGGREGATOR_BASE_ENDPOINT,
    content: env.CONTENT_BASE_ENDPOINT,
    membership: env.MEMBERSHIP_BASE_ENDPOINT ?? null,
    use_org_clusters_fallback: env.USE_ORG_CLUSTERS_FALLBACK,
    internal_rules_enabled: env.ENABLE_INTERNAL_RULES_ORGANIZATIONS,
    internal_rules_orgs: env.INTERNAL_RULES_ORG_IDS.length,
    auth_mode: env.AUTH_MODE,
    upstream_timeout_ms: env.UPSTREAM_TIMEOUT_MS,
    content_refresh_interval_ms: env.CONTENT_REFRESH_INTERVAL_MS,
  },
  "results gateway config",
);

app.addHook("onClose", async () => {
  refresher.stop();
});

refresher.start();

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    app.log.info({ signal }, "shutting down");
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, "shutdown failed");
        process.exit(1);
      },
    );
  });
}

await app.listen({ port: env.PORT, host: env.HOST });
