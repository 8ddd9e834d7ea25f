import { and, asc, desc, eq, gt, lte, sql } from "drizzle-orm";
import type { NodePgDatabase } from "drizzle-orm/node-postgres";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import { ghlIntegrations, ghlPendingInstalls, ghlWebhookEvents, schema } from "./models.js";
import type { InstallationInput, NewWebhookEvent, Store } from "./store.js";
import type { IntegrationRecord, PendingInstall, WebhookEvent } from "./types.js";

export type DB = NodePgDatabase<typeof schema>;

/** Any drizzle Postgres driver over this schema; node-postgres in production. */
export type SchemaDatabase<TQueryResult extends PgQueryResultHKT> = PgDatabase<TQueryResult, typeof schema>;

type IntegrationRow = typeof ghlIntegrations.$inferSelect;
type WebhookRow = typeof ghlWebhookEvents.$inferSelect;
type PendingRow = typeof ghlPendingInstalls.$inferSelect;

export function toIntegrationRecord(row: IntegrationRow): IntegrationRecord {
  return { ...row, userType: row.userType ?? null };
}

export function toWebhookEvent(row: WebhookRow): WebhookEvent {
  return { ...row };
}

export function toPendingInstall(row: PendingRow): PendingInstall {
  return { ...row };
}

/** Columns a compare-and-swap may write; identity and creation time are fixed. */
export function mutableColumns(next: IntegrationRecord) {
  return {
    tenantType: next.tenantType,
    companyId: next.companyId,
    companyName: next.companyName,
    locationName: next.locationName,
    userId: next.userId,
    userEmail: next.userEmail,
    userType: next.userType,
    isBulkInstallation: next.isBulkInstallation,
    accessToken: next.accessToken,
    refreshToken: next.refreshToken,
    refreshTokenId: next.refreshTokenId,
    tokenType: next.tokenType,
    scope: next.scope,
    issuedAt: next.issuedAt,
    expiresAt: next.expiresAt,
    isActive: next.isActive,
    lastRefreshAttemptAt: next.lastRefreshAttemptAt,
    lastRefreshError: next.lastRefreshError,
    lastUsedAt: next.lastUsedAt,
    refreshLeaseUntil: next.refreshLeaseUntil,
  };
}

export class DrizzleStore<TQueryResult extends PgQueryResultHKT = PgQueryResultHKT> implements Store {
  constructor(private readonly db: SchemaDatabase<TQueryResult>) {}

  async getIntegration(id: string) {
    const [row] = await this.db.select().from(ghlIntegrations).where(eq(ghlIntegrations.id, id));
    return row ? toIntegrationRecord(row) : undefined;
  }

  async getIntegrationByTenant(tenantId: string) {
    const [row] = await this.db.select().from(ghlIntegrations).where(eq(ghlIntegrations.tenantId, tenantId));
    return row ? toIntegrationRecord(row) : undefined;
  }

  async listIntegrations(filter: { activeOnly?: boolean } = {}) {
    const rows = await this.db
      .select()
      .from(ghlIntegrations)
      .where(filter.activeOnly ? eq(ghlIntegrations.isActive, true) : undefined)
      .orderBy(desc(ghlIntegrations.installedAt));
    return rows.map(toIntegrationRecord);
  }

  async upsertInstallation(input: InstallationInput, now: Date) {
    const [row] = await this.db
      .insert(ghlIntegrations)
      .values({
        ...input,
        companyName: input.companyName ?? "",
        locationName: input.locationName ?? "",
        userEmail: input.userEmail ?? "",
        isActive: true,
        installedAt: now,
        updatedAt: now,
      })
      .onConflictDoUpdate({
        target: ghlIntegrations.tenantId,
        set: {
          tenantType: input.tenantType,
          companyId: input.companyId,
          userId: input.userId,
          userType: input.userType,
          isBulkInstallation: input.isBulkInstallation,
          accessToken: input.accessToken,
          refreshToken: input.refreshToken,
          refreshTokenId: input.refreshTokenId,
          tokenType: input.tokenType,
          scope: input.scope,
          issuedAt: input.issuedAt,
          expiresAt: input.expiresAt,
          companyName: sql`COALESCE(NULLIF(excluded.company_name, ''), ${ghlIntegrations.companyName})`,
          locationName: sql`COALESCE(NULLIF(excluded.location_name, ''), ${ghlIntegrations.locationName})`,
          userEmail: sql`COALESCE(NULLIF(excluded.user_email, ''), ${ghlIntegrations.userEmail})`,
          isActive: true,
          lastRefreshError: null,
          refreshLeaseUntil: null,
          version: sql`${ghlIntegrations.version} + 1`,
          updatedAt: now,
        },
      })
      .returning();
    // a fresh insert still has its column default
    return { record: toIntegrationRecord(row), created: row.version === 0 };
  }

  async compareAndSwap(next: IntegrationRecord, expectedVersion: number, now: Date) {
    const [row] = await this.db
      .update(ghlIntegrations)
      .set({ ...mutableColumns(next), version: expectedVersion + 1, updatedAt: now })
      .where(and(eq(ghlIntegrations.id, next.id), eq(ghlIntegrations.version, expectedVersion)))
      .returning();
    return row ? toIntegrationRecord(row) : undefined;
  }

  async touchIntegration(id: string, now: Date) {
    await this.db.update(ghlIntegrations).set({ lastUsedAt: now }).where(eq(ghlIntegrations.id, id));
  }

  async recordWebhookEvent(input: NewWebhookEvent) {
    const [inserted] = await this.db
      .insert(ghlWebhookEvents)
      .values(input)
      .onConflictDoNothing({ target: ghlWebhookEvents.externalId })
      .returning();
    if (inserted) return { event: toWebhookEvent(inserted), duplicate: false };

    const [existing] = await this.db
      .select()
      .from(ghlWebhookEvents)
      .where(eq(ghlWebhookEvents.externalId, input.externalId));
    return { event: toWebhookEvent(existing), duplicate: true };
  }

  async markWebhookProcessed(id: string, integrationId: string | null, now: Date) {
    const [row] = await this.db
      .update(ghlWebhookEvents)
      .set({ processed: true, processedAt: now, integrationId })
      .where(and(eq(ghlWebhookEvents.id, id), eq(ghlWebhookEvents.processed, false)))
      .returning();
    return row ? toWebhookEvent(row) : undefined;
  }

  async listWebhookEvents(limit: number) {
    const rows = await this.db
      .select()
      .from(ghlWebhookEvents)
      .orderBy(desc(ghlWebhookEvents.receivedAt))
      .limit(limit);
    return rows.map(toWebhookEvent);
  }

  async savePendingInstall(pending: PendingInstall) {
    await this.db.insert(ghlPendingInstalls).values(pending);
  }

  async takePendingInstall(correlationId: string, now: Date) {
    // DELETE ... RETURNING makes the pending state single use across processes
    const [row] = await this.db
      .delete(ghlPendingInstalls)
      .where(eq(ghlPendingInstalls.correlationId, correlationId))
      .returning();
    if (!row || row.expiresAt <= now) return undefined;
    return toPendingInstall(row);
  }

  async findPendingInstallsByCompany(companyId: string, now: Date) {
    const rows = await this.db
      .select()
      .from(ghlPendingInstalls)
      .where(and(eq(ghlPendingInstalls.companyId, companyId), gt(ghlPendingInstalls.expiresAt, now)))
      .orderBy(asc(ghlPendingInstalls.createdAt));
    return rows.map(toPendingInstall);
  }

  async purgeExpiredPendingInstalls(now: Date) {
    const rows = await this.db
      .delete(ghlPendingInstalls)
      .where(lte(ghlPendingInstalls.expiresAt, now))
      .returning({ correlationId: ghlPendingInstalls.correlationId });
    return rows.length;
  }
}
