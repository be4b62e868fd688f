import { createHmac, timingSafeEqual } from "node:crypto";
import { HttpError } from "./http.js";

export type AuthMode = "off" | "identity_header" | "jwt";

export type Identity = {
  account_number: string;
  org_id: number;
  internal_org_id: number;
  source: "default" | "identity_header" | "jwt";
};

export type AuthResolver = {
  mode: AuthMode;
  required_header_hint: "none" | "x-identity" | "authorization";
  resolve: (headers: Record<string, unknown>) => Identity | null;
};

export const IDENTITY_HEADER = "x-identity";

function asTrimmed(v: unknown): string | null {
  if (typeof v === "number" && Number.isFinite(v)) return String(v);
  if (typeof v !== "string") return null;
  const s = v.trim();
  return s.length > 0 ? s : null;
}

function asOrgId(v: unknown): number | null {
  const s = asTrimmed(v);
  if (!s) return null;
  const n = Number(s);
  return Number.isInteger(n) && n > 0 ? n : null;
}

function asRecord(v: unknown): Record<string, unknown> | null {
  if (!v || typeof v !== "object" || Array.isArray(v)) return null;
  return { ...v };
}

function firstHeader(v: unknown): string | null {
  if (typeof v === "string") return asTrimmed(v);
  if (Array.isArray(v) && v.length > 0) return firstHeader(v[0]);
  return null;
}

function decodeBase64Url(input: string): Buffer {
  const s = input.replace(/-/g, "+").replace(/_/g, "/");
  const pad = s.length % 4 === 0 ? "" : "=".repeat(4 - (s.length % 4));
  return Buffer.from(s + pad, "base64");
}

function parseJsonBase64(input: string): Record<string, unknown> | null {
  try {
    return asRecord(JSON.parse(decodeBase64Url(input).toString("utf8")));
  } catch {
    return null;
  }
}

function parseBearerToken(headers: Record<string, unknown>): string | null {
  const auth = firstHeader(headers["authorization"]);
  if (!auth) return null;
  const m = /^Bearer\s+(.+)$/i.exec(auth);
  if (!m) return null;
  const tok = m[1].trim();
  return tok.length > 0 ? tok : null;
}

function verifyJwtHs256(token: string, secret: string): Record<string, unknown> | null {
  const parts = token.split(".");
  if (parts.length !== 3) return null;
  const [hB64, pB64, sB64] = parts;
  if (!hB64 || !pB64 || !sB64) return null;

  const header = parseJsonBase64(hB64);
  if (!header) return null;
  if (String(header.alg ?? "") !== "HS256") return null;

  const sigGiven = decodeBase64Url(sB64);
  const sigExpected = createHmac("sha256", secret).update(`${hB64}.${pB64}`).digest();
  if (sigGiven.length !== sigExpected.length) return null;
  if (!timingSafeEqual(sigGiven, sigExpected)) return null;

  return parseJsonBase64(pB64);
}

function jwtNotExpired(payload: Record<string, unknown>, nowSec: number, skewSec: number): boolean {
  const exp = typeof payload.exp === "number" ? payload.exp : Number.NaN;
  if (Number.isFinite(exp) && nowSec > exp + skewSec) return false;
  const nbf = typeof payload.nbf === "number" ? payload.nbf : Number.NaN;
  if (Number.isFinite(nbf) && nowSec + skewSec < nbf) return false;
  return true;
}

// Accepts both a bare identity object and one wrapped as { identity: {...} }.
function claimsToIdentity(claims: Record<string, unknown>, source: Identity["source"]): Identity | null {
  const body = asRecord(claims.identity) ?? claims;
  const internal = asRecord(body.internal);
  const orgId = asOrgId(body.org_id) ?? asOrgId(internal?.org_id);
  if (orgId === null) return null;
  const accountNumber = asTrimmed(body.account_number) ?? asTrimmed(body.sub);
  if (!accountNumber) return null;
  return {
    account_number: accountNumber,
    org_id: orgId,
    internal_org_id: asOrgId(internal?.org_id) ?? orgId,
    source,
  };
}

export function createAuthResolver(args: {
  mode: AuthMode;
  jwtHs256Secret?: string;
  jwtClockSkewSec?: number;
  defaultOrgId: number;
  defaultAccountNumber: string;
}): AuthResolver {
  const mode = args.mode;
  const jwtSecret = mode === "jwt" ? String(args.jwtHs256Secret ?? "") : "";
  const skewSec = Math.max(0, Math.trunc(args.jwtClockSkewSec ?? 30));
  const fallback: Identity = {
    account_number: args.defaultAccountNumber,
    org_id: args.defaultOrgId,
    internal_org_id: args.defaultOrgId,
    source: "default",
  };

  const required_header_hint: AuthResolver["required_header_hint"] =
    mode === "off" ? "none" : mode === "identity_header" ? "x-identity" : "authorization";

  return {
    mode,
    required_header_hint,
    resolve: (headers: Record<string, unknown>) => {
      if (mode === "off") return fallback;

      if (mode === "identity_header") {
        const raw = firstHeader(headers[IDENTITY_HEADER]);
        if (!raw) return null;
        const claims = parseJsonBase64(raw);
        return claims ? claimsToIdentity(claims, "identity_header") : null;
      }

      const token = parseBearerToken(headers);
      if (!token || !jwtSecret) return null;
      const payload = verifyJwtHs256(token, jwtSecret);
      if (!payload) return null;
      if (!jwtNotExpired(payload, Math.floor(Date.now() / 1000), skewSec)) return null;
      return claimsToIdentity(payload, "jwt");
    },
  };
}

export function requireIdentity(resolver: AuthResolver, headers: Record<string, unknown>): Identity {
  const identity = resolver.resolve(headers);
  if (!identity) {
    throw new HttpError(401, "missing_identity", `valid identity is required (${resolver.required_header_hint})`);
  }
  return identity;
}
