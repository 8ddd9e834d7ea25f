import { randomUUID } from "node:crypto";
import type { InstallationInput, NewWebhookEvent, Store } from "./store.js";
import type { IntegrationRecord, PendingInstall, WebhookEvent } from "./types.js";

/**
 * Process-local store. Backs the test suite and local runs without DATABASE_URL.
 * Every read hands out a copy so callers cannot mutate stored state in place.
 */
export class MemoryStore implements Store {
  private integrations = new Map<string, IntegrationRecord>();
  private tenantIndex = new Map<string, string>();
  private webhooks = new Map<string, WebhookEvent>();
  private webhookIndex = new Map<string, string>();
  private pending = new Map<string, PendingInstall>();

  async getIntegration(id: string) {
    const rec = this.integrations.get(id);
    return rec ? structuredClone(rec) : undefined;
  }

  async getIntegrationByTenant(tenantId: string) {
    const id = this.tenantIndex.get(tenantId);
    return id ? this.getIntegration(id) : undefined;
  }

  async listIntegrations(filter: { activeOnly?: boolean } = {}) {
    return [...this.integrations.values()]
      .filter((r) => !filter.activeOnly || r.isActive)
      .sort((a, b) => b.installedAt.getTime() - a.installedAt.getTime())
      .map((r) => structuredClone(r));
  }

  async upsertInstallation(input: InstallationInput, now: Date) {
    const existingId = this.tenantIndex.get(input.tenantId);
    const existing = existingId ? this.integrations.get(existingId) : undefined;

    if (existing) {
      const record: IntegrationRecord = {
        ...existing,
        ...input,
        companyName: input.companyName || existing.companyName,
        locationName: input.locationName || existing.locationName,
        userEmail: input.userEmail || existing.userEmail,
        isActive: true,
        lastRefreshError: null,
        refreshLeaseUntil: null,
        updatedAt: now,
        version: existing.version + 1,
      };
      this.integrations.set(record.id, record);
      return { record: structuredClone(record), created: false };
    }

    const record: IntegrationRecord = {
      id: randomUUID(),
      ...input,
      companyName: input.companyName ?? "",
      locationName: input.locationName ?? "",
      userEmail: input.userEmail ?? "",
      isActive: true,
      lastRefreshAttemptAt: null,
      lastRefreshError: null,
      installedAt: now,
      lastUsedAt: null,
      updatedAt: now,
      version: 0,
      refreshLeaseUntil: null,
    };
    this.integrations.set(record.id, record);
    this.tenantIndex.set(record.tenantId, record.id);
    return { record: structuredClone(record), created: true };
  }

  async compareAndSwap(next: IntegrationRecord, expectedVersion: number, now: Date) {
    const current = this.integrations.get(next.id);
    if (!current || current.version !== expectedVersion) return undefined;
    const saved: IntegrationRecord = {
      ...structuredClone(next),
      // identity is not writable through CAS
      id: current.id,
      tenantId: current.tenantId,
      installedAt: current.installedAt,
      version: expectedVersion + 1,
      updatedAt: now,
    };
    this.integrations.set(saved.id, saved);
    return structuredClone(saved);
  }

  async touchIntegration(id: string, now: Date) {
    const rec = this.integrations.get(id);
    if (rec) rec.lastUsedAt = now;
  }

  async recordWebhookEvent(input: NewWebhookEvent) {
    const existingId = this.webhookIndex.get(input.externalId);
    const existing = existingId ? this.webhooks.get(existingId) : undefined;
    if (existing) return { event: structuredClone(existing), duplicate: true };

    const event: WebhookEvent = {
      id: randomUUID(),
      ...structuredClone(input),
      processed: false,
      processedAt: null,
    };
    this.webhooks.set(event.id, event);
    this.webhookIndex.set(event.externalId, event.id);
    return { event: structuredClone(event), duplicate: false };
  }

  async markWebhookProcessed(id: string, integrationId: string | null, now: Date) {
    const event = this.webhooks.get(id);
    if (!event || event.processed) return undefined;
    event.processed = true;
    event.processedAt = now;
    event.integrationId = integrationId;
    return structuredClone(event);
  }

  async listWebhookEvents(limit: number) {
    return [...this.webhooks.values()]
      .sort((a, b) => b.receivedAt.getTime() - a.receivedAt.getTime())
      .slice(0, limit)
      .map((e) => structuredClone(e));
  }

  async savePendingInstall(pending: PendingInstall) {
    this.pending.set(pending.correlationId, structuredClone(pending));
  }

  async takePendingInstall(correlationId: string, now: Date) {
    const pending = this.pending.get(correlationId);
    if (!pending) return undefined;
    this.pending.delete(correlationId);
    return pending.expiresAt > now ? pending : undefined;
  }

  async findPendingInstallsByCompany(companyId: string, now: Date) {
    return [...this.pending.values()]
      .filter((p) => p.companyId === companyId && p.expiresAt > now)
      .map((p) => structuredClone(p));
  }

  async purgeExpiredPendingInstalls(now: Date) {
    let purged = 0;
    for (const [id, p] of this.pending) {
      if (p.expiresAt <= now) {
        this.pending.delete(id);
        purged++;
      }
    }
    return purged;
  }
}
