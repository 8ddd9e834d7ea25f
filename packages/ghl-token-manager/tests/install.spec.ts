import { describe, it, expect } from "vitest";
import { addSeconds } from "date-fns";
import { OAuthExchanger, type Transport } from "../src/auth.js";
import { ConflictError, InvalidGrantError, NotFoundError, ValidationError } from "../src/errors.js";
import { InstallationFlow } from "../src/install.js";
import { MemoryStore } from "../src/memoryStore.js";
import { mutateIntegration } from "../src/store.js";
import { NOW, deferred, jsonResponse, manualClock, queuedTransport, testConfig, tokenBody } from "./helpers.js";

const companyTokens = tokenBody({
  locationId: undefined,
  userType: "Company",
  approvedLocations: ["loc-a", "loc-b"],
});

function setup(transport: Transport) {
  const store = new MemoryStore();
  const time = manualClock();
  const flow = new InstallationFlow(store, new OAuthExchanger(testConfig, transport), testConfig, { clock: time.clock });
  return { store, flow, time };
}

describe("InstallationFlow.beginInstall", () => {
  it("issues a random state and puts it on the authorize URL", () => {
    const { flow } = setup(queuedTransport());
    const first = flow.beginInstall();
    const second = flow.beginInstall();
    expect(first.state).toMatch(/^[0-9a-f]{32}$/);
    expect(first.state).not.toBe(second.state);
    expect(new URL(first.url).searchParams.get("state")).toBe(first.state);
  });
});

describe("InstallationFlow.handleCallback", () => {
  it("persists the tenant named by the provider", async () => {
    const { store, flow } = setup(queuedTransport(jsonResponse(tokenBody())));

    const outcome = await flow.handleCallback({ code: "code-1" });

    expect(outcome.status).toBe("TOKEN_PERSISTED");
    if (outcome.status !== "TOKEN_PERSISTED") return;
    expect(outcome.created).toBe(true);
    expect(outcome.record).toMatchObject({
      tenantId: "location-1",
      tenantType: "Location",
      companyId: "company-1",
      userId: "user-1",
      accessToken: "access-1",
      refreshToken: "refresh-1",
      isActive: true,
      issuedAt: NOW,
      expiresAt: addSeconds(NOW, 86399),
    });
    expect(await store.listIntegrations()).toHaveLength(1);
  });

  it("defers when the code carries no tenant and persists nothing", async () => {
    const { store, flow } = setup(queuedTransport(jsonResponse(companyTokens)));

    const outcome = await flow.handleCallback({ code: "code-1" });

    expect(outcome).toMatchObject({
      status: "TENANT_SELECTION_PENDING",
      choices: ["loc-a", "loc-b", "company-1"],
      expiresAt: addSeconds(NOW, 600),
    });
    expect(await store.listIntegrations()).toHaveLength(0);
  });

  it("rejects a missing code before calling the provider", async () => {
    const transport = queuedTransport();
    const { flow } = setup(transport);
    await expect(flow.handleCallback({ code: "  " })).rejects.toBeInstanceOf(ValidationError);
    expect(transport).not.toHaveBeenCalled();
  });

  it("reports a replayed code as a conflict and keeps one active record", async () => {
    const { store, flow } = setup(
      queuedTransport(jsonResponse(tokenBody()), jsonResponse({ error: "invalid_grant" }, 400)),
    );

    await flow.handleCallback({ code: "code-1" });
    await expect(flow.handleCallback({ code: "code-1" })).rejects.toBeInstanceOf(ConflictError);

    const active = await store.listIntegrations({ activeOnly: true });
    expect(active).toHaveLength(1);
    expect(active[0].accessToken).toBe("access-1");
  });

  it("passes the provider's InvalidGrant through for a code it never saw", async () => {
    const { store, flow } = setup(queuedTransport(jsonResponse({ error: "invalid_grant" }, 400)));
    await expect(flow.handleCallback({ code: "stale" })).rejects.toBeInstanceOf(InvalidGrantError);
    expect(await store.listIntegrations()).toHaveLength(0);
  });

  it("refuses the same code while its first exchange is still running", async () => {
    const gate = deferred<Response>();
    const transport = queuedTransport();
    transport.mockImplementationOnce(() => gate.promise);
    const { store, flow } = setup(transport);

    const first = flow.handleCallback({ code: "code-1" });
    await expect(flow.handleCallback({ code: "code-1" })).rejects.toBeInstanceOf(ConflictError);
    gate.resolve(jsonResponse(tokenBody()));
    await first;

    expect(transport).toHaveBeenCalledTimes(1);
    expect(await store.listIntegrations()).toHaveLength(1);
  });

  it("reactivates and overwrites the record on reinstall", async () => {
    const { store, flow } = setup(
      queuedTransport(jsonResponse(tokenBody()), jsonResponse(tokenBody({ access_token: "access-new" }))),
    );
    const first = await flow.handleCallback({ code: "code-1" });
    if (first.status !== "TOKEN_PERSISTED") throw new Error("expected a persisted install");
    await mutateIntegration(store, first.record.id, NOW, (r) => ({ ...r, isActive: false }));

    const second = await flow.handleCallback({ code: "code-2" });

    expect(second).toMatchObject({ status: "TOKEN_PERSISTED", created: false });
    const all = await store.listIntegrations();
    expect(all).toHaveLength(1);
    expect(all[0]).toMatchObject({ id: first.record.id, isActive: true, accessToken: "access-new" });
  });
});

describe("InstallationFlow.completeSelection", () => {
  async function pending() {
    const ctx = setup(queuedTransport(jsonResponse(companyTokens)));
    const outcome = await ctx.flow.handleCallback({ code: "code-1" });
    if (outcome.status !== "TENANT_SELECTION_PENDING") throw new Error("expected a pending install");
    return { ...ctx, correlationId: outcome.correlationId };
  }

  it("persists the chosen location", async () => {
    const { store, flow, correlationId } = await pending();

    const outcome = await flow.completeSelection(correlationId, "loc-b");

    expect(outcome).toMatchObject({ status: "TOKEN_PERSISTED", created: true });
    const [record] = await store.listIntegrations();
    expect(record).toMatchObject({ tenantId: "loc-b", tenantType: "Location", accessToken: "access-1" });
  });

  it("dates the token from the code exchange, not from the selection", async () => {
    const { store, flow, time } = setup(queuedTransport(jsonResponse({ ...companyTokens, expires_in: 3600 })));
    const outcome = await flow.handleCallback({ code: "code-1" });
    if (outcome.status !== "TENANT_SELECTION_PENDING") throw new Error("expected a pending install");

    time.advance(540);
    await flow.completeSelection(outcome.correlationId, "loc-a");

    const [record] = await store.listIntegrations();
    expect(record.issuedAt).toEqual(NOW);
    expect(record.expiresAt).toEqual(new Date("2026-03-01T13:00:00.000Z"));
  });

  it("records a company-level install when the company is chosen", async () => {
    const { store, flow, correlationId } = await pending();
    await flow.completeSelection(correlationId, "company-1");
    const [record] = await store.listIntegrations();
    expect(record).toMatchObject({ tenantId: "company-1", tenantType: "Company" });
  });

  it("is single use", async () => {
    const { flow, correlationId } = await pending();
    await flow.completeSelection(correlationId, "loc-a");
    await expect(flow.completeSelection(correlationId, "loc-a")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("rejects a tenant that was not offered and keeps the selection open", async () => {
    const { store, flow, correlationId } = await pending();
    await expect(flow.completeSelection(correlationId, "loc-z")).rejects.toBeInstanceOf(ValidationError);
    await flow.completeSelection(correlationId, "loc-a");
    expect(await store.listIntegrations()).toHaveLength(1);
  });

  it("expires after the pending TTL", async () => {
    const { store, flow, time, correlationId } = await pending();
    time.advance(601);
    await expect(flow.completeSelection(correlationId, "loc-a")).rejects.toBeInstanceOf(NotFoundError);
    expect(await store.listIntegrations()).toHaveLength(0);
  });
});

describe("InstallationFlow.completeFromWebhook", () => {
  it("completes the one pending install that offered the location", async () => {
    const { store, flow } = setup(queuedTransport(jsonResponse(companyTokens)));
    await flow.handleCallback({ code: "code-1" });

    expect(await flow.completeFromWebhook("company-1", "loc-x")).toBeUndefined();
    const record = await flow.completeFromWebhook("company-1", "loc-a");

    expect(record).toMatchObject({ tenantId: "loc-a", accessToken: "access-1" });
    expect(await store.findPendingInstallsByCompany("company-1", NOW)).toHaveLength(0);
  });

  it("keeps the exchange time when the webhook arrives later", async () => {
    const { flow, time } = setup(queuedTransport(jsonResponse(companyTokens)));
    await flow.handleCallback({ code: "code-1" });
    time.advance(120);

    const record = await flow.completeFromWebhook("company-1", "loc-b");

    expect(record?.issuedAt).toEqual(NOW);
    expect(record?.expiresAt).toEqual(addSeconds(NOW, 86399));
  });
});
