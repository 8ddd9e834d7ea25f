import crypto from "node:crypto";
import { z } from "zod";
import type { GhlConfig } from "./config.js";
import { InvalidGrantError, NetworkError, ProviderError, errorMessage } from "./errors.js";
import { componentLogger } from "./logger.js";
import type { TenantType, TokenSet } from "./types.js";

const log = componentLogger("oauth");

export type Transport = (url: string, init: RequestInit) => Promise<Response>;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().default("Bearer"),
  expires_in: z.coerce.number().int().positive(),
  refresh_token: z.string().min(1).optional(),
  refreshTokenId: z.string().optional(),
  scope: z.string().default(""),
  userType: z.enum(["Company", "Location"]).optional(),
  companyId: z.string().optional(),
  locationId: z.string().optional(),
  userId: z.string().optional(),
  isBulkInstallation: z.boolean().default(false),
  approvedLocations: z.array(z.string()).default([]),
});

export type ExchangeResult =
  | { kind: "tokens"; tokens: TokenSet; tenantId: string; tenantType: TenantType }
  | {
      kind: "tenant_selection_required";
      tokens: TokenSet;
      companyId: string | null;
      userId: string | null;
      choices: string[];
    };

/**
 * Talks to the provider's token endpoint. Holds no state beyond its config;
 * persistence is the caller's business.
 */
export class OAuthExchanger {
  constructor(
    private readonly config: GhlConfig,
    private readonly transport: Transport = (url, init) => fetch(url, init),
  ) {}

  buildAuthorizeUrl(state: string) {
    const params = new URLSearchParams({
      response_type: "code",
      client_id: this.config.clientId,
      redirect_uri: this.config.redirectUri,
      scope: this.config.scopes.join(" "),
      state,
    });
    return `${this.config.authUrl}?${params.toString()}`;
  }

  async exchangeCode(
    code: string,
    redirectUri: string = this.config.redirectUri,
    opts: { locationHint?: string } = {},
  ): Promise<ExchangeResult> {
    const form: Record<string, string> = {
      grant_type: "authorization_code",
      code,
      redirect_uri: redirectUri,
    };
    if (opts.locationHint) form.location_id = opts.locationHint;

    const tokens = await this.post(form);
    return resolveTenant(tokens, opts.locationHint);
  }

  async refresh(refreshToken: string): Promise<TokenSet> {
    return this.post({ grant_type: "refresh_token", refresh_token: refreshToken });
  }

  private async post(form: Record<string, string>): Promise<TokenSet> {
    const body = new URLSearchParams({
      client_id: this.config.clientId,
      client_secret: this.config.clientSecret,
      user_type: this.config.userType,
      ...form,
    });

    let res: Response;
    try {
      res = await this.transport(this.config.tokenUrl, {
        method: "POST",
        headers: {
          "Content-Type": "application/x-www-form-urlencoded",
          Accept: "application/json",
        },
        body: body.toString(),
        signal: AbortSignal.timeout(this.config.requestTimeoutMs),
      });
    } catch (e) {
      const timedOut = e instanceof Error && e.name === "TimeoutError";
      const message = timedOut
        ? `Token endpoint did not answer within ${this.config.requestTimeoutMs}ms`
        : `Token endpoint unreachable: ${errorMessage(e)}`;
      log.warn({ grantType: form.grant_type, timedOut }, message);
      throw new NetworkError(message, e);
    }

    const text = await res.text();
    const json = parseJson(text);

    if (!res.ok) {
      if (isInvalidGrant(json)) {
        log.warn({ grantType: form.grant_type, status: res.status }, "provider rejected grant");
        throw new InvalidGrantError(describeProviderError(json) ?? "Grant is invalid, expired or revoked", json);
      }
      log.warn({ grantType: form.grant_type, status: res.status, body: json }, "token endpoint error");
      throw new ProviderError(
        `Token endpoint returned ${res.status}: ${describeProviderError(json) ?? text.slice(0, 200)}`,
        res.status,
        json,
      );
    }

    const parsed = tokenResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new ProviderError(`Unexpected token response: ${parsed.error.issues[0]?.message ?? "invalid body"}`, res.status);
    }
    const t = parsed.data;
    return {
      accessToken: t.access_token,
      refreshToken: t.refresh_token,
      refreshTokenId: t.refreshTokenId,
      expiresIn: t.expires_in,
      tokenType: t.token_type,
      scope: t.scope.split(/\s+/).filter(Boolean),
      userType: t.userType,
      companyId: t.companyId,
      locationId: t.locationId,
      userId: t.userId,
      isBulkInstallation: t.isBulkInstallation,
      approvedLocations: t.approvedLocations,
    };
  }
}

/**
 * Picks the tenant a fresh token set belongs to: the location the provider
 * names, else the callback's location, else the only approved location.
 * Anything else needs the user to choose.
 */
export function resolveTenant(tokens: TokenSet, locationHint?: string): ExchangeResult {
  const locationId =
    tokens.locationId ??
    locationHint ??
    (tokens.approvedLocations.length === 1 ? tokens.approvedLocations[0] : undefined);
  if (locationId) {
    return { kind: "tokens", tokens, tenantId: locationId, tenantType: "Location" };
  }
  const choices = [...new Set([...tokens.approvedLocations, ...(tokens.companyId ? [tokens.companyId] : [])])];
  return {
    kind: "tenant_selection_required",
    tokens,
    companyId: tokens.companyId ?? null,
    userId: tokens.userId ?? null,
    choices,
  };
}

function parseJson(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return { raw: text };
  }
}

function field(body: unknown, key: string): string | undefined {
  if (typeof body !== "object" || body === null) return undefined;
  const value: unknown = Reflect.get(body, key);
  return typeof value === "string" ? value : undefined;
}

function isInvalidGrant(body: unknown) {
  return field(body, "error") === "invalid_grant";
}

function describeProviderError(body: unknown) {
  return field(body, "error_description") ?? field(body, "message") ?? field(body, "error");
}

/**
 * Provider webhooks carry a base64 RSA-SHA256 signature of the raw body in
 * `x-wh-signature`.
 */
export function verifyWebhookSignature(rawBody: Buffer | string, signatureHeader: string, publicKey: string) {
  if (!signatureHeader) return false;
  try {
    return crypto.verify(
      "sha256",
      Buffer.isBuffer(rawBody) ? rawBody : Buffer.from(rawBody),
      publicKey,
      Buffer.from(signatureHeader, "base64"),
    );
  } catch (e) {
    log.warn({ err: e }, "webhook signature check failed");
    return false;
  }
}
