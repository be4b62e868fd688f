import { z } from "zod";

export const RuleContent = z.object({
  rule_id: z.string().min(1),
  error_key: z.string().min(1),
  description: z.string().default(""),
  generic: z.string().default(""),
  reason: z.string().default(""),
  resolution: z.string().default(""),
  more_info: z.string().default(""),
  total_risk: z.number().int().min(0).max(4),
  likelihood: z.number().int().min(0).max(4).default(0),
  impact: z.number().int().min(0).max(4).default(0),
  publish_date: z.string().default(""),
  tags: z.array(z.string()).default([]),
  internal: z.boolean().default(false),
  // Audience eligibility: content relevant to managed (OSD) deployments.
  osd_customer: z.boolean().default(false),
});
export type RuleContent = z.infer<typeof RuleContent>;

export const ContentEnvelope = z.object({
  status: z.string(),
  rules: z.array(RuleContent),
});

export const RuleGroup = z.object({
  title: z.string(),
  description: z.string().default(""),
  tags: z.array(z.string()).default([]),
});
export type RuleGroup = z.infer<typeof RuleGroup>;

export const GroupsEnvelope = z.object({
  status: z.string(),
  groups: z.array(RuleGroup),
});
