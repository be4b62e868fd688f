import { z } from "zod";

export const RawRuleHit = z
  .object({
    component: z.string().min(1),
    key: z.string().min(1),
    disabled: z.boolean().default(false),
    user_vote: z.number().int().default(0),
    disable_feedback: z.string().default(""),
    disabled_at: z.string().nullable().default(""),
    created_at: z.string().nullable().default(""),
    details: z.unknown().optional(),
  })
  .passthrough();
export type RawRuleHit = z.infer<typeof RawRuleHit>;

export const ReportMeta = z.object({
  count: z.number().int(),
  last_checked_at: z.string().nullable().default(""),
});

export const ReportResponse = z.object({
  meta: ReportMeta,
  reports: z.array(RawRuleHit).nullable().transform((v) => v ?? []),
});
export type ReportResponse = z.infer<typeof ReportResponse>;

export const ReportEnvelope = z.object({
  status: z.string(),
  report: ReportResponse,
});

export const ReportMetainfo = z
  .object({
    count: z.number().int(),
    last_checked_at: z.string().nullable().default(""),
    stored_at: z.string().nullable().default(""),
  })
  .passthrough();
export type ReportMetainfo = z.infer<typeof ReportMetainfo>;

export const MetainfoEnvelope = z.object({
  status: z.string(),
  metainfo: ReportMetainfo,
});

export const RuleOnReportEnvelope = z.object({
  status: z.string(),
  report: RawRuleHit,
});

// Multi-cluster answers are handed to the client as-is; only the outline is checked.
export const ClusterReports = z
  .object({
    clusters: z.array(z.string()).nullable().optional(),
    errors: z.array(z.string()).nullable().optional(),
    reports: z.record(z.unknown()).nullable().optional(),
    generated_at: z.string().optional(),
    status: z.string(),
  })
  .passthrough();
export type ClusterReports = z.infer<typeof ClusterReports>;

export const OrgClustersEnvelope = z.object({
  status: z.string(),
  clusters: z.array(z.string()).nullable().transform((v) => v ?? []),
});

export const ClusterListInBody = z
  .object({
    clusters: z.array(z.string().uuid()),
  })
  .passthrough();
