import { vi } from "vitest";
import { addSeconds } from "date-fns";
import type { GhlConfig } from "../src/config.js";
import type { Transport } from "../src/auth.js";
import type { InstallationInput, TokenStore } from "../src/store.js";
import type { Clock, IntegrationRecord, TokenSet } from "../src/types.js";

export const NOW = new Date("2026-03-01T12:00:00.000Z");

export const testConfig: GhlConfig = {
  clientId: "test-client",
  clientSecret: "test-secret",
  redirectUri: "http://localhost:3000/app/callback/",
  scopes: ["contacts.readonly", "locations.readonly"],
  authUrl: "https://auth.example.test/oauth/chooselocation",
  tokenUrl: "https://auth.example.test/oauth/token",
  userType: "Location",
  refreshLeadTimeSeconds: 3600,
  requestTimeoutMs: 1000,
  pendingInstallTtlSeconds: 600,
  pgSsl: false,
};

/** A clock the test moves by hand. */
export function manualClock(start: Date = NOW) {
  let current = new Date(start);
  const clock: Clock = () => new Date(current);
  return {
    clock,
    advance(seconds: number) {
      current = addSeconds(current, seconds);
    },
  };
}

export function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

/** Provider token endpoint body, as returned for a location install. */
export function tokenBody(overrides: Record<string, unknown> = {}) {
  return {
    access_token: "access-1",
    token_type: "Bearer",
    expires_in: 86399,
    refresh_token: "refresh-1",
    scope: "contacts.readonly locations.readonly",
    userType: "Location",
    companyId: "company-1",
    locationId: "location-1",
    userId: "user-1",
    ...overrides,
  };
}

/** Answers each call with the next queued response; an Error is thrown instead. */
export function queuedTransport(...responses: Array<Response | Error>) {
  const queue = [...responses];
  return vi.fn<Transport>(async () => {
    const next = queue.shift();
    if (!next) throw new Error("no response queued");
    if (next instanceof Error) throw next;
    return next;
  });
}

export function formOf(init: RequestInit | undefined) {
  return new URLSearchParams(typeof init?.body === "string" ? init.body : "");
}

export function tokenSet(overrides: Partial<TokenSet> = {}): TokenSet {
  return {
    accessToken: "access-2",
    refreshToken: "refresh-2",
    expiresIn: 86400,
    tokenType: "Bearer",
    scope: ["contacts.readonly"],
    isBulkInstallation: false,
    approvedLocations: [],
    ...overrides,
  };
}

export function installationInput(overrides: Partial<InstallationInput> = {}): InstallationInput {
  return {
    tenantId: "location-1",
    tenantType: "Location",
    companyId: "company-1",
    userId: "user-1",
    userType: "Location",
    isBulkInstallation: false,
    accessToken: "access-0",
    refreshToken: "refresh-0",
    refreshTokenId: null,
    tokenType: "Bearer",
    scope: ["contacts.readonly"],
    issuedAt: NOW,
    expiresAt: addSeconds(NOW, 86400),
    ...overrides,
  };
}

export async function seed(
  store: TokenStore,
  overrides: Partial<InstallationInput> = {},
  installedAt: Date = NOW,
): Promise<IntegrationRecord> {
  const { record } = await store.upsertInstallation(installationInput(overrides), installedAt);
  return record;
}

export function makeRecord(overrides: Partial<IntegrationRecord> = {}): IntegrationRecord {
  return {
    id: "6f1c1c4e-2d0a-4a57-9a43-0a4a6f3a2b11",
    tenantId: "location-1",
    tenantType: "Location",
    companyId: "company-1",
    companyName: "",
    locationName: "",
    userId: "user-1",
    userEmail: "",
    userType: "Location",
    isBulkInstallation: false,
    accessToken: "access-0",
    refreshToken: "refresh-0",
    refreshTokenId: null,
    tokenType: "Bearer",
    scope: ["contacts.readonly"],
    issuedAt: NOW,
    expiresAt: addSeconds(NOW, 86400),
    isActive: true,
    lastRefreshAttemptAt: null,
    lastRefreshError: null,
    installedAt: NOW,
    lastUsedAt: null,
    updatedAt: NOW,
    version: 0,
    refreshLeaseUntil: null,
    ...overrides,
  };
}

export function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
