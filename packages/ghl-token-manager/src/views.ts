import { differenceInSeconds } from "date-fns";
import type { TokenState } from "./policy.js";
import type { BulkRefreshSummary, HealthSummary, RefreshOutcome } from "./refresh.js";
import type { IntegrationRecord } from "./types.js";

// Read-only projections for the HTTP surface. None of them carries a token.

export interface IntegrationView {
  id: string;
  tenant_id: string;
  tenant_type: IntegrationRecord["tenantType"];
  company_id: string | null;
  company_name: string;
  location_name: string;
  user_id: string;
  user_email: string;
  user_type: IntegrationRecord["userType"];
  is_bulk_installation: boolean;
  is_active: boolean;
  state: TokenState;
  token_type: string;
  scope: string[];
  issued_at: string;
  expires_at: string;
  seconds_until_expiry: number;
  installed_at: string;
  last_used_at: string | null;
  last_refresh_attempt_at: string | null;
  last_refresh_error: string | null;
}

export function toIntegrationView(r: IntegrationRecord, state: TokenState, now: Date): IntegrationView {
  return {
    id: r.id,
    tenant_id: r.tenantId,
    tenant_type: r.tenantType,
    company_id: r.companyId,
    company_name: r.companyName,
    location_name: r.locationName,
    user_id: r.userId,
    user_email: r.userEmail,
    user_type: r.userType,
    is_bulk_installation: r.isBulkInstallation,
    is_active: r.isActive,
    state,
    token_type: r.tokenType,
    scope: r.scope,
    issued_at: r.issuedAt.toISOString(),
    expires_at: r.expiresAt.toISOString(),
    seconds_until_expiry: Math.max(0, differenceInSeconds(r.expiresAt, now)),
    installed_at: r.installedAt.toISOString(),
    last_used_at: r.lastUsedAt?.toISOString() ?? null,
    last_refresh_attempt_at: r.lastRefreshAttemptAt?.toISOString() ?? null,
    last_refresh_error: r.lastRefreshError,
  };
}

export function toOutcomeView(o: RefreshOutcome) {
  return {
    integration_id: o.integrationId,
    tenant_id: o.tenantId,
    status: o.status,
    state: o.state,
    expires_at: o.expiresAt.toISOString(),
    ...(o.error ? { error: o.error } : {}),
  };
}

export function toBulkRefreshView(s: BulkRefreshSummary) {
  return {
    success: s.success,
    total: s.total,
    refreshed_count: s.refreshedCount,
    failed_count: s.failedCount,
    invalidated_count: s.invalidatedCount,
    skipped_count: s.skippedCount,
    results: s.outcomes.map(toOutcomeView),
  };
}

export function toHealthView(h: HealthSummary) {
  return {
    total: h.total,
    active: h.active,
    counts: h.counts,
    health_percentage: h.healthPercentage,
  };
}
