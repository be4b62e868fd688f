import { ContentTimeoutError } from "../errors.js";
import type { RuleContent } from "./schemas.js";

/**
 * Lookup of descriptive content by (rule id, error key).
 *
 * Resolves `null` when no content exists. Rejects with `ContentTimeoutError`
 * when content cannot be consulted in time, which callers must not treat as
 * "not found".
 */
export interface ContentLookup {
  contentFor(ruleId: string, errorKey: string): Promise<RuleContent | null>;
}

const REPORT_SUFFIX = ".report";

// Aggregator modules carry a ".report" suffix the content repository does not use.
export function normalizeRuleId(ruleId: string): string {
  const s = ruleId.trim();
  return s.endsWith(REPORT_SUFFIX) ? s.slice(0, -REPORT_SUFFIX.length) : s;
}

function contentKey(ruleId: string, errorKey: string): string {
  return `${normalizeRuleId(ruleId)}|${errorKey.trim()}`;
}

/**
 * Process-wide snapshot of rule content, replaced wholesale by the content
 * refresher. Lookups made before the first load wait up to `waitTimeoutMs`.
 */
export class RuleContentDirectory implements ContentLookup {
  private readonly waitTimeoutMs: number;
  private entries: Map<string, RuleContent> | null = null;
  private readonly ready: Promise<void>;
  private markReady: () => void = () => {};

  constructor(opts: { waitTimeoutMs: number }) {
    this.waitTimeoutMs = Math.max(1, Math.trunc(opts.waitTimeoutMs));
    this.ready = new Promise<void>((resolve) => {
      this.markReady = resolve;
    });
  }

  load(rules: RuleContent[]): void {
    const next = new Map<string, RuleContent>();
    for (const rule of rules) {
      next.set(contentKey(rule.rule_id, rule.error_key), rule);
    }
    this.entries = next;
    this.markReady();
  }

  isLoaded(): boolean {
    return this.entries !== null;
  }

  size(): number {
    return this.entries?.size ?? 0;
  }

  async contentFor(ruleId: string, errorKey: string): Promise<RuleContent | null> {
    const entries = this.entries ?? (await this.waitForFirstLoad());
    return entries.get(contentKey(ruleId, errorKey)) ?? null;
  }

  private async waitForFirstLoad(): Promise<Map<string, RuleContent>> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), this.waitTimeoutMs);
    });
    try {
      const outcome = await Promise.race([this.ready.then(() => "ready" as const), timedOut]);
      if (outcome === "timeout" || this.entries === null) {
        throw new ContentTimeoutError(this.waitTimeoutMs);
      }
      return this.entries;
    } finally {
      clearTimeout(timer);
    }
  }
}
