import { ConflictError, NotFoundError } from "./errors.js";
import type { IntegrationRecord, PendingInstall, WebhookEvent } from "./types.js";

/** Fields written by a successful code exchange. */
export type InstallationInput = Pick<
  IntegrationRecord,
  | "tenantId"
  | "tenantType"
  | "companyId"
  | "userId"
  | "userType"
  | "isBulkInstallation"
  | "accessToken"
  | "refreshToken"
  | "refreshTokenId"
  | "tokenType"
  | "scope"
  | "issuedAt"
  | "expiresAt"
> &
  Partial<Pick<IntegrationRecord, "companyName" | "locationName" | "userEmail">>;

export type NewWebhookEvent = Omit<WebhookEvent, "id" | "processed" | "processedAt">;

export interface TokenStore {
  getIntegration(id: string): Promise<IntegrationRecord | undefined>;
  getIntegrationByTenant(tenantId: string): Promise<IntegrationRecord | undefined>;
  listIntegrations(filter?: { activeOnly?: boolean }): Promise<IntegrationRecord[]>;
  /**
   * Creates the tenant's record, or reactivates and overwrites the existing one
   * (keeping its id). Atomic per tenant.
   */
  upsertInstallation(input: InstallationInput, now: Date): Promise<{ record: IntegrationRecord; created: boolean }>;
  /**
   * Writes every mutable field of `next` if the stored version still equals
   * `expectedVersion`. Returns the stored record, or undefined when another
   * writer got there first.
   */
  compareAndSwap(next: IntegrationRecord, expectedVersion: number, now: Date): Promise<IntegrationRecord | undefined>;
  /** Bookkeeping only; does not take part in version checks. */
  touchIntegration(id: string, now: Date): Promise<void>;
}

export interface WebhookStore {
  /** Inserts unless an event with the same externalId exists, in which case that one is returned. */
  recordWebhookEvent(input: NewWebhookEvent): Promise<{ event: WebhookEvent; duplicate: boolean }>;
  /** Marks once; returns undefined if the event was already processed. */
  markWebhookProcessed(id: string, integrationId: string | null, now: Date): Promise<WebhookEvent | undefined>;
  listWebhookEvents(limit: number): Promise<WebhookEvent[]>;
}

export interface PendingInstallStore {
  savePendingInstall(pending: PendingInstall): Promise<void>;
  /** Removes and returns the pending install; undefined if unknown or expired. */
  takePendingInstall(correlationId: string, now: Date): Promise<PendingInstall | undefined>;
  findPendingInstallsByCompany(companyId: string, now: Date): Promise<PendingInstall[]>;
  purgeExpiredPendingInstalls(now: Date): Promise<number>;
}

export type Store = TokenStore & WebhookStore & PendingInstallStore;

const MAX_CAS_ATTEMPTS = 5;

/**
 * Read-modify-write of one integration under the version check, retried when a
 * concurrent writer wins. `mutate` returning undefined means "nothing to change".
 */
export async function mutateIntegration(
  store: TokenStore,
  id: string,
  now: Date,
  mutate: (current: IntegrationRecord) => IntegrationRecord | undefined,
): Promise<IntegrationRecord> {
  for (let attempt = 0; attempt < MAX_CAS_ATTEMPTS; attempt++) {
    const current = await store.getIntegration(id);
    if (!current) throw new NotFoundError("Integration");
    const next = mutate(current);
    if (!next) return current;
    const saved = await store.compareAndSwap(next, current.version, now);
    if (saved) return saved;
  }
  throw new ConflictError(`Integration ${id} is being modified concurrently`);
}
