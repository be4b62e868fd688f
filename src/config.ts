import { z } from "zod";

const boolFlag = (fallback: "true" | "false") =>
  z
    .string()
    .optional()
    .transform((v) => (v ?? fallback).toLowerCase())
    .pipe(z.enum(["true", "false"]))
    .transform((v) => v === "true");

const EnvSchema = z.object({
  APP_ENV: z.enum(["dev", "ci", "prod"]).default("dev"),
  PORT: z.coerce.number().int().positive().default(8080),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  API_PREFIX: z
    .string()
    .default("/api/v1")
    .transform((v) => `/${v.trim().replace(/^\/+|\/+$/g, "")}`),

  AGGREGATOR_BASE_ENDPOINT: z.string().url(),
  CONTENT_BASE_ENDPOINT: z.string().url(),
  // Membership service is optional; without it clusters come from the aggregator.
  MEMBERSHIP_BASE_ENDPOINT: z.string().url().optional(),
  MEMBERSHIP_TOKEN: z.string().optional(),
  MEMBERSHIP_PAGE_SIZE: z.coerce.number().int().positive().max(500).default(100),
  USE_ORG_CLUSTERS_FALLBACK: boolFlag("true"),

  ENABLE_INTERNAL_RULES_ORGANIZATIONS: boolFlag("false"),
  INTERNAL_RULES_ORGANIZATIONS: z.string().default(""),

  AUTH_MODE: z.enum(["off", "identity_header", "jwt"]).default("off"),
  AUTH_JWT_HS256_SECRET: z.string().default(""),
  AUTH_JWT_CLOCK_SKEW_SEC: z.coerce.number().int().min(0).default(30),
  // Identity used for every request when AUTH_MODE=off.
  AUTH_DEFAULT_ORG_ID: z.coerce.number().int().positive().default(1),
  AUTH_DEFAULT_ACCOUNT_NUMBER: z.string().min(1).default("1"),

  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().max(120_000).default(10_000),
  CONTENT_REFRESH_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
  CONTENT_WAIT_TIMEOUT_MS: z.coerce.number().int().positive().max(60_000).default(5_000),
});

export type RawEnv = z.infer<typeof EnvSchema>;

export type Env = RawEnv & {
  INTERNAL_RULES_ORG_IDS: number[];
};

export function parseOrgIdList(raw: string): number[] {
  const out: number[] = [];
  for (const part of raw.split(",")) {
    const s = part.trim();
    if (!s) continue;
    const n = Number(s);
    if (!Number.isInteger(n) || n <= 0) {
      throw new Error(`INTERNAL_RULES_ORGANIZATIONS contains an invalid organization id: ${s}`);
    }
    out.push(n);
  }
  return out;
}

export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("\n");
    throw new Error(`Invalid environment:\n${msg}`);
  }
  if (parsed.data.AUTH_MODE === "jwt" && !parsed.data.AUTH_JWT_HS256_SECRET) {
    throw new Error("AUTH_JWT_HS256_SECRET is required when AUTH_MODE=jwt");
  }
  if (parsed.data.APP_ENV === "prod" && parsed.data.AUTH_MODE === "off") {
    throw new Error("AUTH_MODE=off is not allowed when APP_ENV=prod");
  }
  const orgIds = parseOrgIdList(parsed.data.INTERNAL_RULES_ORGANIZATIONS);
  if (parsed.data.ENABLE_INTERNAL_RULES_ORGANIZATIONS && orgIds.length === 0) {
    throw new Error("ENABLE_INTERNAL_RULES_ORGANIZATIONS=true requires INTERNAL_RULES_ORGANIZATIONS");
  }
  return { ...parsed.data, INTERNAL_RULES_ORG_IDS: orgIds };
}
