import stableStringify from "fast-json-stable-stringify";
import type { Backend } from "../backends.js";
import type { LatestMailbox } from "../groups/mailbox.js";
import type { Logger } from "../logger.js";
import { callUpstream, decodeJson, expectOk, makeUrlToEndpoint, type UpstreamOptions } from "../upstream/http.js";
import { sha256Hex } from "../util/crypto.js";
import { formatError } from "../util/error-format.js";
import type { RuleContentDirectory } from "./directory.js";
import { ContentEnvelope, GroupsEnvelope, type RuleGroup } from "./schemas.js";

export const ContentEndpoint = "content";
export const GroupsEndpoint = "groups";

export type RefreshOutcome = {
  content_rules: number | null;
  groups: number | null;
  groups_changed: boolean;
};

/**
 * Periodically pulls rule content and rule groups from the content service.
 * Content replaces the directory snapshot; groups go to the mailbox, or the
 * failure does. It is the only writer of both.
 */
export class ContentRefresher {
  private readonly backend: Backend;
  private readonly http: UpstreamOptions;
  private readonly directory: RuleContentDirectory;
  private readonly groups: LatestMailbox<RuleGroup[]>;
  private readonly intervalMs: number;
  private readonly log: Logger;
  private groupsDigest: string | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;

  constructor(opts: {
    backend: Backend;
    http: UpstreamOptions;
    directory: RuleContentDirectory;
    groups: LatestMailbox<RuleGroup[]>;
    intervalMs: number;
    log: Logger;
  }) {
    this.backend = opts.backend;
    this.http = opts.http;
    this.directory = opts.directory;
    this.groups = opts.groups;
    this.intervalMs = Math.max(1000, Math.trunc(opts.intervalMs));
    this.log = opts.log;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    void this.tick();
  }

  stop(): void {
    this.running = false;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
  }

  async refreshOnce(): Promise<RefreshOutcome> {
    const outcome: RefreshOutcome = { content_rules: null, groups: null, groups_changed: false };

    try {
      const url = makeUrlToEndpoint(this.backend.baseUrl, ContentEndpoint);
      const res = expectOk(this.backend, await callUpstream(this.backend, url, { method: "GET" }, this.http));
      const { rules } = decodeJson(this.backend, ContentEnvelope, res.body);
      this.directory.load(rules);
      outcome.content_rules = rules.length;
    } catch (err: unknown) {
      // The directory keeps serving the last loaded snapshot.
      this.log.error({ err: formatError(err) }, "rule content refresh failed");
    }

    try {
      const url = makeUrlToEndpoint(this.backend.baseUrl, GroupsEndpoint);
      const res = expectOk(this.backend, await callUpstream(this.backend, url, { method: "GET" }, this.http));
      const { groups } = decodeJson(this.backend, GroupsEnvelope, res.body);
      const digest = sha256Hex(stableStringify(groups));
      outcome.groups = groups.length;
      if (digest !== this.groupsDigest || this.groups.read().kind !== "value") {
        this.groups.publish(groups);
        outcome.groups_changed = digest !== this.groupsDigest;
        this.groupsDigest = digest;
        this.log.info({ groups: groups.length, digest }, "rule groups published");
      }
    } catch (err: unknown) {
      this.log.error({ err: formatError(err) }, "error occurred during groups retrieval from content service");
      this.groups.fail(err instanceof Error ? err : new Error(formatError(err)));
    }

    return outcome;
  }

  private async tick(): Promise<void> {
    if (!this.running) return;
    const outcome = await this.refreshOnce();
    this.log.debug(outcome, "content refresh finished");
    if (!this.running) return;
    this.timer = setTimeout(() => void this.tick(), this.intervalMs);
  }
}
