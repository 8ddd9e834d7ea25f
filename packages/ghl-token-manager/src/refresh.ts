import { setTimeout as sleep } from "node:timers/promises";
import { addMilliseconds, addHours, subDays, isBefore } from "date-fns";
import type { OAuthExchanger } from "./auth.js";
import type { GhlConfig } from "./config.js";
import { ConflictError, InvalidGrantError, NotFoundError, isTerminal } from "./errors.js";
import { componentLogger } from "./logger.js";
import {
  applyRefreshResult,
  decide,
  describeRefreshError,
  tokenState,
  type RefreshResult,
  type TokenState,
} from "./policy.js";
import { mutateIntegration, type TokenStore } from "./store.js";
import { systemClock, type Clock, type IntegrationRecord } from "./types.js";

const log = componentLogger("refresh");

// Lease outlives the provider call so a slow response cannot overlap a second claimant
const LEASE_GRACE_MS = 5_000;
const SEVERELY_EXPIRED_DAYS = 7;
const UNUSED_DAYS = 30;

export type RefreshStatus =
  | "refreshed"
  | "skipped"
  | "in_progress"
  | "invalidated"
  | "failed"
  | "superseded"
  | "would_refresh";

export interface RefreshOutcome {
  integrationId: string;
  tenantId: string;
  status: RefreshStatus;
  state: TokenState;
  expiresAt: Date;
  error?: string;
}

export interface BulkRefreshSummary {
  success: true;
  total: number;
  refreshedCount: number;
  failedCount: number;
  invalidatedCount: number;
  skippedCount: number;
  outcomes: RefreshOutcome[];
}

export interface HealthSummary {
  total: number;
  active: number;
  counts: Record<TokenState, number>;
  healthPercentage: number;
}

export interface ValidToken {
  accessToken: string;
  tokenType: string;
  expiresAt: Date;
  wasRefreshed: boolean;
  state: TokenState;
}

export interface DailyHealthReport {
  summary: HealthSummary;
  severelyExpired: Array<Pick<IntegrationRecord, "id" | "tenantId" | "expiresAt">>;
  unused: Array<Pick<IntegrationRecord, "id" | "tenantId" | "lastUsedAt">>;
}

export interface RefreshServiceOptions {
  clock?: Clock;
  /** How often a caller waiting on someone else's refresh re-reads the record. */
  pollIntervalMs?: number;
  maxWaitMs?: number;
}

interface Attempt {
  outcome: RefreshOutcome;
  record: IntegrationRecord;
  error?: unknown;
}

/**
 * Where the request-path check, the scheduled sweep and the manual endpoint
 * meet. Each refresh claims a per-record lease through the store's version
 * check before the refresh token leaves the process, so two callers never
 * spend the same refresh token.
 */
export class RefreshService {
  private readonly clock: Clock;
  private readonly pollIntervalMs: number;
  private readonly maxWaitMs: number;

  constructor(
    private readonly store: TokenStore,
    private readonly exchanger: Pick<OAuthExchanger, "refresh">,
    private readonly config: Pick<GhlConfig, "refreshLeadTimeSeconds" | "requestTimeoutMs">,
    opts: RefreshServiceOptions = {},
  ) {
    this.clock = opts.clock ?? systemClock;
    this.pollIntervalMs = opts.pollIntervalMs ?? 250;
    this.maxWaitMs = opts.maxWaitMs ?? config.requestTimeoutMs + LEASE_GRACE_MS;
  }

  stateOf(record: Pick<IntegrationRecord, "isActive" | "expiresAt">, now: Date = this.clock()) {
    return tokenState(record, now, this.config.refreshLeadTimeSeconds);
  }

  /** Manual refresh of one integration. `force` refreshes even a fresh token. */
  async refreshOne(id: string, opts: { force?: boolean } = {}): Promise<RefreshOutcome> {
    const record = await this.store.getIntegration(id);
    if (!record) throw new NotFoundError("Integration");
    if (!record.isActive) throw new ConflictError("Integration is not active; reinstall the app to reauthorize");
    const attempt = await this.attempt(record, opts.force ?? false);
    return attempt.outcome;
  }

  /**
   * Evaluates every active integration on its own. One tenant's failure,
   * terminal or not, never stops the others.
   */
  async refreshAll(opts: { force?: boolean; dryRun?: boolean } = {}): Promise<BulkRefreshSummary> {
    const records = await this.store.listIntegrations({ activeOnly: true });
    const outcomes: RefreshOutcome[] = [];

    for (const record of records) {
      if (opts.dryRun) {
        const now = this.clock();
        const wouldRefresh = opts.force || decide(record, now, this.config.refreshLeadTimeSeconds) === "should_refresh";
        outcomes.push(this.outcome(record, wouldRefresh ? "would_refresh" : "skipped", now));
        continue;
      }
      try {
        const { outcome } = await this.attempt(record, opts.force ?? false);
        outcomes.push(outcome);
      } catch (e) {
        log.error({ err: e, integrationId: record.id }, "refresh attempt crashed");
        outcomes.push(this.outcome(record, "failed", this.clock(), describeRefreshError(e)));
      }
    }

    const count = (s: RefreshStatus) => outcomes.filter((o) => o.status === s).length;
    const summary: BulkRefreshSummary = {
      success: true,
      total: records.length,
      refreshedCount: count("refreshed"),
      failedCount: count("failed"),
      invalidatedCount: count("invalidated"),
      skippedCount: outcomes.length - count("refreshed") - count("failed") - count("invalidated"),
      outcomes,
    };
    log.info(
      {
        total: summary.total,
        refreshed: summary.refreshedCount,
        failed: summary.failedCount,
        invalidated: summary.invalidatedCount,
        dryRun: Boolean(opts.dryRun),
      },
      "bulk refresh finished",
    );
    return summary;
  }

  /** Current access token, refreshed just in time when it is near or past expiry. */
  async getValidToken(id: string): Promise<ValidToken> {
    const record = await this.store.getIntegration(id);
    if (!record) throw new NotFoundError("Integration");
    if (!record.isActive) throw new ConflictError("Integration is not active");

    const now = this.clock();
    const before = this.stateOf(record, now);
    if (before === "FRESH") return this.serve(record, false, now);

    const { outcome, record: after, error } = await this.attempt(record, false);
    switch (outcome.status) {
      case "refreshed":
        return this.serve(after, true, this.clock());
      case "invalidated":
        throw new InvalidGrantError("Refresh token was rejected; the integration has been deactivated");
      case "failed":
        // the old token is still good until expiry
        if (before === "NEAR_EXPIRY" && this.stateOf(after) !== "EXPIRED") {
          log.warn({ integrationId: id, error: outcome.error }, "serving current token after failed refresh");
          return this.serve(after, false, this.clock());
        }
        throw error;
      case "in_progress":
        if (before === "NEAR_EXPIRY" && this.stateOf(after) !== "EXPIRED") {
          return this.serve(after, false, this.clock());
        }
        return this.awaitOtherRefresh(id);
      case "superseded":
        return this.awaitOtherRefresh(id);
      default:
        return this.serve(after, false, this.clock());
    }
  }

  async healthSummary(): Promise<HealthSummary> {
    const now = this.clock();
    const records = await this.store.listIntegrations();
    const counts: Record<TokenState, number> = { FRESH: 0, NEAR_EXPIRY: 0, EXPIRED: 0, INVALID: 0 };
    for (const r of records) counts[this.stateOf(r, now)]++;
    const active = records.filter((r) => r.isActive).length;
    return {
      total: records.length,
      active,
      counts,
      healthPercentage: active ? Math.round((counts.FRESH / active) * 10_000) / 100 : 0,
    };
  }

  async expiringWithin(hours: number): Promise<IntegrationRecord[]> {
    const threshold = addHours(this.clock(), hours);
    const records = await this.store.listIntegrations({ activeOnly: true });
    return records
      .filter((r) => r.expiresAt <= threshold)
      .sort((a, b) => a.expiresAt.getTime() - b.expiresAt.getTime());
  }

  async dailyHealthReport(): Promise<DailyHealthReport> {
    const now = this.clock();
    const summary = await this.healthSummary();
    const active = await this.store.listIntegrations({ activeOnly: true });

    const severelyExpired = active
      .filter((r) => isBefore(r.expiresAt, subDays(now, SEVERELY_EXPIRED_DAYS)))
      .map(({ id, tenantId, expiresAt }) => ({ id, tenantId, expiresAt }));
    const unused = active
      .filter((r) => isBefore(r.lastUsedAt ?? r.installedAt, subDays(now, UNUSED_DAYS)))
      .map(({ id, tenantId, lastUsedAt }) => ({ id, tenantId, lastUsedAt }));

    log.info({ ...summary.counts, total: summary.total, health: summary.healthPercentage }, "daily token health");
    for (const r of severelyExpired) {
      log.warn({ integrationId: r.id, tenantId: r.tenantId, expiresAt: r.expiresAt }, "severely expired integration");
    }
    if (unused.length) log.info({ count: unused.length }, "integrations unused for 30 days");
    return { summary, severelyExpired, unused };
  }

  private async attempt(record: IntegrationRecord, force: boolean): Promise<Attempt> {
    const now = this.clock();
    const decision = decide(record, now, this.config.refreshLeadTimeSeconds);

    if (decision === "already_invalid" || (decision === "no_action_needed" && !force)) {
      return { outcome: this.outcome(record, "skipped", now), record };
    }
    if (record.refreshLeaseUntil && record.refreshLeaseUntil > now) {
      return { outcome: this.outcome(record, "in_progress", now), record };
    }
    if (!record.refreshToken) {
      const error = new Error("No refresh token available");
      const failed = applyRefreshResult(record, { ok: false, error }, now);
      const saved = (await this.store.compareAndSwap(failed, record.version, now)) ?? record;
      return { outcome: this.outcome(saved, "failed", now, failed.lastRefreshError ?? undefined), record: saved, error };
    }

    const leased = await this.store.compareAndSwap(
      { ...record, refreshLeaseUntil: addMilliseconds(now, this.config.requestTimeoutMs + LEASE_GRACE_MS) },
      record.version,
      now,
    );
    if (!leased) {
      log.debug({ integrationId: record.id }, "lost refresh race");
      return { outcome: this.outcome(record, "in_progress", now), record };
    }

    let result: RefreshResult;
    try {
      result = { ok: true, tokens: await this.exchanger.refresh(leased.refreshToken) };
    } catch (error) {
      result = { ok: false, error };
    }

    const finishedAt = this.clock();
    const next = applyRefreshResult(leased, result, finishedAt);
    const saved =
      (await this.store.compareAndSwap(next, leased.version, finishedAt)) ??
      (await this.mergeLateResult(leased, result, finishedAt));
    if (!saved) {
      // a reinstall rewrote the token pair while we were out; its tokens win
      log.warn({ integrationId: record.id }, "refresh result discarded, tokens replaced underneath");
      const current = (await this.store.getIntegration(record.id)) ?? leased;
      return { outcome: this.outcome(current, "superseded", finishedAt), record: current };
    }

    if (result.ok) {
      log.info({ integrationId: saved.id, tenantId: saved.tenantId, expiresAt: saved.expiresAt }, "token refreshed");
      return { outcome: this.outcome(saved, "refreshed", finishedAt), record: saved };
    }
    if (isTerminal(result.error)) {
      log.error({ integrationId: saved.id, tenantId: saved.tenantId }, "refresh token rejected, integration deactivated");
      return { outcome: this.outcome(saved, "invalidated", finishedAt, saved.lastRefreshError ?? undefined), record: saved, error: result.error };
    }
    log.warn({ integrationId: saved.id, error: saved.lastRefreshError }, "refresh failed, will retry on next pass");
    return { outcome: this.outcome(saved, "failed", finishedAt, saved.lastRefreshError ?? undefined), record: saved, error: result.error };
  }

  /**
   * The version moved during the provider call. Webhook writes leave the
   * token pair alone while the provider may already have spent the old
   * refresh token, so the result is folded into the current record unless
   * the pair itself was replaced.
   */
  private async mergeLateResult(
    leased: IntegrationRecord,
    result: RefreshResult,
    now: Date,
  ): Promise<IntegrationRecord | undefined> {
    const samePair = (r: IntegrationRecord) =>
      r.accessToken === leased.accessToken && r.refreshToken === leased.refreshToken;
    const current = await this.store.getIntegration(leased.id);
    if (!current || !samePair(current)) return undefined;

    let replaced = false;
    const merged = await mutateIntegration(this.store, leased.id, now, (cur) => {
      replaced = !samePair(cur);
      return replaced ? undefined : applyRefreshResult(cur, result, now);
    });
    return replaced ? undefined : merged;
  }

  private async awaitOtherRefresh(id: string): Promise<ValidToken> {
    const attempts = Math.max(1, Math.ceil(this.maxWaitMs / this.pollIntervalMs));
    for (let i = 0; i < attempts; i++) {
      await sleep(this.pollIntervalMs);
      const current = await this.store.getIntegration(id);
      if (!current) throw new NotFoundError("Integration");
      if (!current.isActive) throw new InvalidGrantError("Integration was deactivated during refresh");
      const now = this.clock();
      const leaseHeld = current.refreshLeaseUntil !== null && current.refreshLeaseUntil > now;
      if (leaseHeld) continue;
      if (this.stateOf(current, now) !== "EXPIRED") return this.serve(current, true, now);
      break;
    }
    throw new ConflictError("Token refresh is in progress elsewhere; retry shortly");
  }

  private async serve(record: IntegrationRecord, wasRefreshed: boolean, now: Date): Promise<ValidToken> {
    await this.store.touchIntegration(record.id, now);
    return {
      accessToken: record.accessToken,
      tokenType: record.tokenType,
      expiresAt: record.expiresAt,
      wasRefreshed,
      state: this.stateOf(record, now),
    };
  }

  private outcome(record: IntegrationRecord, status: RefreshStatus, now: Date, error?: string): RefreshOutcome {
    return {
      integrationId: record.id,
      tenantId: record.tenantId,
      status,
      state: this.stateOf(record, now),
      expiresAt: record.expiresAt,
      ...(error ? { error } : {}),
    };
  }
}
