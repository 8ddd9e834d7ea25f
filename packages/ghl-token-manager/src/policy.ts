import { addSeconds, isBefore, subSeconds } from "date-fns";
import { GhlError, errorMessage, isTerminal } from "./errors.js";
import type { IntegrationRecord, TokenSet } from "./types.js";

export type TokenState = "FRESH" | "NEAR_EXPIRY" | "EXPIRED" | "INVALID";

export type RefreshDecision = "no_action_needed" | "should_refresh" | "already_invalid";

export type RefreshResult = { ok: true; tokens: TokenSet } | { ok: false; error: unknown };

type Evaluated = Pick<IntegrationRecord, "isActive" | "expiresAt">;

/**
 * Only INVALID is stored (as `isActive = false`); the other states follow from
 * the clock and `expiresAt`.
 */
export function tokenState(record: Evaluated, now: Date, leadTimeSeconds: number): TokenState {
  if (!record.isActive) return "INVALID";
  if (!isBefore(now, record.expiresAt)) return "EXPIRED";
  if (!isBefore(now, subSeconds(record.expiresAt, leadTimeSeconds))) return "NEAR_EXPIRY";
  return "FRESH";
}

export function decide(record: Evaluated, now: Date, leadTimeSeconds: number): RefreshDecision {
  switch (tokenState(record, now, leadTimeSeconds)) {
    case "INVALID":
      return "already_invalid";
    case "NEAR_EXPIRY":
    case "EXPIRED":
      return "should_refresh";
    case "FRESH":
      return "no_action_needed";
  }
}

export function describeRefreshError(error: unknown) {
  const kind = error instanceof GhlError ? error.kind : "Error";
  return `${kind}: ${errorMessage(error)}`;
}

/**
 * Folds the outcome of one refresh attempt into the record. Tokens only ever
 * change together, and a rejected grant leaves the old pair in place for audit.
 */
export function applyRefreshResult(record: IntegrationRecord, result: RefreshResult, now: Date): IntegrationRecord {
  const attempted = { ...record, lastRefreshAttemptAt: now, refreshLeaseUntil: null };

  if (result.ok) {
    const t = result.tokens;
    return {
      ...attempted,
      accessToken: t.accessToken,
      // rotation is optional per response
      refreshToken: t.refreshToken ?? record.refreshToken,
      refreshTokenId: t.refreshTokenId ?? record.refreshTokenId,
      tokenType: t.tokenType,
      scope: t.scope.length ? t.scope : record.scope,
      userType: t.userType ?? record.userType,
      isBulkInstallation: t.isBulkInstallation,
      issuedAt: now,
      expiresAt: addSeconds(now, t.expiresIn),
      lastRefreshError: null,
    };
  }

  if (isTerminal(result.error)) {
    return { ...attempted, isActive: false, lastRefreshError: describeRefreshError(result.error) };
  }

  return { ...attempted, lastRefreshError: describeRefreshError(result.error) };
}
