import { describe, it, expect } from "vitest";
import { loadConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

const base = { GHL_CLIENT_ID: "test-client", GHL_CLIENT_SECRET: "test-secret" };

describe("loadConfig", () => {
  it("fills in defaults", () => {
    const config = loadConfig(base);
    expect(config).toMatchObject({
      clientId: "test-client",
      clientSecret: "test-secret",
      redirectUri: "http://localhost:3000/app/callback/",
      scopes: ["contacts.readonly", "contacts.write", "locations.readonly", "users.readonly"],
      userType: "Company",
      refreshLeadTimeSeconds: 3600,
      requestTimeoutMs: 30000,
      pendingInstallTtlSeconds: 600,
      pgSsl: false,
    });
    expect(config.adminApiKey).toBeUndefined();
    expect(config.databaseUrl).toBeUndefined();
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      ...base,
      GHL_SCOPES: "contacts.readonly  users.readonly",
      GHL_USER_TYPE: "Location",
      GHL_REFRESH_LEAD_TIME: "120",
      ADMIN_API_KEY: "  admin-key ",
      GHL_WEBHOOK_PUBLIC_KEY: "-----BEGIN PUBLIC KEY-----\\nabc\\n-----END PUBLIC KEY-----",
      PGSSL: "true",
    });
    expect(config.scopes).toEqual(["contacts.readonly", "users.readonly"]);
    expect(config.userType).toBe("Location");
    expect(config.refreshLeadTimeSeconds).toBe(120);
    expect(config.adminApiKey).toBe("admin-key");
    expect(config.webhookPublicKey).toBe("-----BEGIN PUBLIC KEY-----\nabc\n-----END PUBLIC KEY-----");
    expect(config.pgSsl).toBe(true);
  });

  it("treats blank optional values as unset", () => {
    expect(loadConfig({ ...base, ADMIN_API_KEY: "", DATABASE_URL: " " }).adminApiKey).toBeUndefined();
  });

  it("lists every problem at once", () => {
    let caught: unknown;
    try {
      loadConfig({ GHL_REFRESH_LEAD_TIME: "soon" });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError && caught.problems).toEqual([
      "GHL_CLIENT_ID: Required",
      "GHL_CLIENT_SECRET: Required",
      "GHL_REFRESH_LEAD_TIME: Expected number, received nan",
    ]);
  });
});
