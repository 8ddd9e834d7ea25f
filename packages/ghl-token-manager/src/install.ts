import crypto from "node:crypto";
import { addSeconds } from "date-fns";
import type { OAuthExchanger } from "./auth.js";
import type { GhlConfig } from "./config.js";
import { ConflictError, InvalidGrantError, NotFoundError, ValidationError } from "./errors.js";
import { componentLogger } from "./logger.js";
import type { InstallationInput, PendingInstallStore, TokenStore } from "./store.js";
import { systemClock, type Clock, type IntegrationRecord, type TenantType, type TokenSet } from "./types.js";

const log = componentLogger("install");

const REMEMBERED_CODES = 1_000;

export type InstallOutcome =
  | { status: "TOKEN_PERSISTED"; record: IntegrationRecord; created: boolean }
  | { status: "TENANT_SELECTION_PENDING"; correlationId: string; choices: string[]; expiresAt: Date };

export interface CallbackParams {
  code?: string;
  locationId?: string;
}

/**
 * AWAITING_CODE → CODE_RECEIVED → (TENANT_RESOLVED | TENANT_SELECTION_PENDING) → TOKEN_PERSISTED.
 * The authorization code is single use at the provider, so a replay can only
 * ever fail; it never reaches the store.
 */
export class InstallationFlow {
  private readonly clock: Clock;
  private readonly inflightCodes = new Set<string>();
  private readonly consumedCodes = new Set<string>();

  constructor(
    private readonly store: TokenStore & PendingInstallStore,
    private readonly exchanger: Pick<OAuthExchanger, "exchangeCode" | "buildAuthorizeUrl">,
    private readonly config: Pick<GhlConfig, "redirectUri" | "pendingInstallTtlSeconds">,
    opts: { clock?: Clock } = {},
  ) {
    this.clock = opts.clock ?? systemClock;
  }

  beginInstall() {
    const state = crypto.randomBytes(16).toString("hex");
    return { state, url: this.exchanger.buildAuthorizeUrl(state) };
  }

  async handleCallback(params: CallbackParams): Promise<InstallOutcome> {
    const code = params.code?.trim();
    if (!code) throw new ValidationError("Missing authorization code");

    const codeKey = crypto.createHash("sha256").update(code).digest("hex");
    if (this.inflightCodes.has(codeKey)) {
      throw new ConflictError("Authorization code is already being exchanged");
    }

    this.inflightCodes.add(codeKey);
    let result;
    try {
      result = await this.exchanger.exchangeCode(code, this.config.redirectUri, { locationHint: params.locationId });
    } catch (e) {
      if (e instanceof InvalidGrantError && this.consumedCodes.has(codeKey)) {
        throw new ConflictError("Authorization code was already used for an installation");
      }
      throw e;
    } finally {
      this.inflightCodes.delete(codeKey);
    }
    this.rememberCode(codeKey);

    const now = this.clock();
    if (result.kind === "tokens") {
      return this.persist(result.tokens, result.tenantId, result.tenantType, now);
    }

    const correlationId = crypto.randomBytes(24).toString("base64url");
    const expiresAt = addSeconds(now, this.config.pendingInstallTtlSeconds);
    await this.store.purgeExpiredPendingInstalls(now);
    await this.store.savePendingInstall({
      correlationId,
      tokens: result.tokens,
      companyId: result.companyId,
      userId: result.userId,
      choices: result.choices,
      createdAt: now,
      expiresAt,
    });
    log.info({ companyId: result.companyId, choices: result.choices.length }, "install waiting for tenant selection");
    return { status: "TENANT_SELECTION_PENDING", correlationId, choices: result.choices, expiresAt };
  }

  /** Second step of a deferred install: the user picked one of the offered tenants. */
  async completeSelection(correlationId: string, tenantId: string): Promise<InstallOutcome> {
    const now = this.clock();
    const pending = await this.store.takePendingInstall(correlationId, now);
    if (!pending) throw new NotFoundError("Pending installation");

    if (!pending.choices.includes(tenantId)) {
      await this.store.savePendingInstall(pending);
      throw new ValidationError(`Tenant ${tenantId} is not one of the offered choices`);
    }

    const tenantType: TenantType = tenantId === pending.companyId ? "Company" : "Location";
    return this.persist(pending.tokens, tenantId, tenantType, now, pending.createdAt);
  }

  /**
   * An INSTALL notification can name the location a pending install was
   * waiting on. Completes it when exactly one pending install of that company
   * offered the location.
   */
  async completeFromWebhook(companyId: string, locationId: string): Promise<IntegrationRecord | undefined> {
    const now = this.clock();
    const candidates = (await this.store.findPendingInstallsByCompany(companyId, now)).filter((p) =>
      p.choices.includes(locationId),
    );
    if (candidates.length !== 1) {
      if (candidates.length > 1) log.warn({ companyId, locationId }, "several pending installs match webhook, leaving them");
      return undefined;
    }
    const pending = await this.store.takePendingInstall(candidates[0].correlationId, now);
    if (!pending) return undefined;
    const outcome = await this.persist(pending.tokens, locationId, "Location", now, pending.createdAt);
    return outcome.status === "TOKEN_PERSISTED" ? outcome.record : undefined;
  }

  /** `issuedAt` is when the code was exchanged, which precedes `now` for deferred installs. */
  private async persist(
    tokens: TokenSet,
    tenantId: string,
    tenantType: TenantType,
    now: Date,
    issuedAt: Date = now,
  ): Promise<InstallOutcome> {
    const input: InstallationInput = {
      tenantId,
      tenantType,
      companyId: tokens.companyId ?? null,
      userId: tokens.userId ?? "",
      userType: tokens.userType ?? null,
      isBulkInstallation: tokens.isBulkInstallation,
      accessToken: tokens.accessToken,
      refreshToken: tokens.refreshToken ?? "",
      refreshTokenId: tokens.refreshTokenId ?? null,
      tokenType: tokens.tokenType,
      scope: tokens.scope,
      issuedAt,
      expiresAt: addSeconds(issuedAt, tokens.expiresIn),
    };
    const { record, created } = await this.store.upsertInstallation(input, now);
    log.info({ integrationId: record.id, tenantId, created }, created ? "integration installed" : "integration reinstalled");
    return { status: "TOKEN_PERSISTED", record, created };
  }

  private rememberCode(codeKey: string) {
    if (this.consumedCodes.size >= REMEMBERED_CODES) {
      const oldest = this.consumedCodes.values().next();
      if (!oldest.done) this.consumedCodes.delete(oldest.value);
    }
    this.consumedCodes.add(codeKey);
  }
}
