import { describe, it, expect, vi } from "vitest";
import { MemoryStore } from "../src/memoryStore.js";
import { mutateIntegration } from "../src/store.js";
import { WebhookReceiver, parseWebhook } from "../src/webhooks.js";
import { NOW, seed } from "./helpers.js";

function setup() {
  const store = new MemoryStore();
  const installs = { completeFromWebhook: vi.fn(async () => undefined) };
  const receiver = new WebhookReceiver(store, installs, { clock: () => new Date(NOW) });
  return { store, installs, receiver };
}

const uninstall = { type: "UNINSTALL", webhookId: "wh-1", appId: "app-1", locationId: "location-1", companyId: "company-1" };
const install = { type: "INSTALL", webhookId: "wh-2", appId: "app-1", locationId: "location-1", companyId: "company-1" };

describe("parseWebhook", () => {
  it("finds the tenant in the shapes the provider uses", () => {
    const tenantOf = (raw: unknown) => {
      const parsed = parseWebhook(raw);
      return parsed.ok ? parsed.notification.tenantId : parsed.reason;
    };
    expect(tenantOf({ type: "INSTALL", id: 7, location_id: "loc-1" })).toBe("loc-1");
    expect(tenantOf({ type: "INSTALL", id: 7, location: { id: "loc-2" } })).toBe("loc-2");
    expect(tenantOf({ type: "INSTALL", id: 7, data: { locationId: "loc-3" } })).toBe("loc-3");
    expect(tenantOf({ type: "UNINSTALL", id: 7, companyId: "company-9" })).toBe("company-9");
    expect(tenantOf({ type: "ContactCreate", id: 7 })).toBeNull();
  });

  it("classifies event types case-insensitively, with aliases", () => {
    const kindOf = (type: string) => {
      const parsed = parseWebhook({ type, eventId: "e-1" });
      return parsed.ok ? parsed.notification.kind : parsed.reason;
    };
    expect(kindOf("install")).toBe("install");
    expect(kindOf("app.installed")).toBe("install");
    expect(kindOf("Uninstall")).toBe("uninstall");
    expect(kindOf("app.uninstalled")).toBe("uninstall");
    expect(kindOf("LocationUpdate")).toBe("unknown");
  });

  it("uses webhookId, then eventId, then id as the event identity", () => {
    const idOf = (raw: unknown) => {
      const parsed = parseWebhook(raw);
      return parsed.ok ? parsed.notification.externalId : parsed.reason;
    };
    expect(idOf({ type: "X", webhookId: "a", eventId: "b", id: "c" })).toBe("a");
    expect(idOf({ type: "X", eventId: "b", id: "c" })).toBe("b");
    expect(idOf({ type: "X", id: 42 })).toBe("42");
  });

  it("rejects payloads without a type or an event id", () => {
    expect(parseWebhook({ webhookId: "wh-1" })).toEqual({ ok: false, reason: "type: Required" });
    expect(parseWebhook({ type: "INSTALL" })).toEqual({
      ok: false,
      reason: "event id is required (webhookId, eventId or id)",
    });
    expect(parseWebhook(["INSTALL"])).toEqual({ ok: false, reason: "Webhook body must be a JSON object" });
  });
});

describe("WebhookReceiver", () => {
  it("deactivates the tenant on uninstall and records the event as processed", async () => {
    const { store, receiver } = setup();
    const rec = await seed(store);

    const result = await receiver.receive(uninstall);

    expect(result).toMatchObject({ status: "accepted", kind: "uninstall", duplicate: false });
    if (result.status !== "accepted") return;
    expect(result.event).toMatchObject({
      externalId: "wh-1",
      eventType: "UNINSTALL",
      tenantId: "location-1",
      integrationId: rec.id,
      processed: true,
      processedAt: NOW,
    });
    expect((await store.getIntegration(rec.id))?.isActive).toBe(false);
  });

  it("applies a redelivered event only once", async () => {
    const { store, receiver } = setup();
    const rec = await seed(store);

    await receiver.receive(uninstall);
    const afterFirst = await store.getIntegration(rec.id);
    const again = await receiver.receive(uninstall);

    expect(again).toMatchObject({ status: "accepted", duplicate: true });
    const afterSecond = await store.getIntegration(rec.id);
    expect(afterSecond?.isActive).toBe(false);
    expect(afterSecond?.version).toBe(afterFirst?.version);
    expect(await store.listWebhookEvents(10)).toHaveLength(1);
  });

  it("does not let a late redelivery of an old install undo a later uninstall", async () => {
    const { store, receiver } = setup();
    const rec = await seed(store);

    await receiver.receive(install);
    await receiver.receive(uninstall);
    await receiver.receive(install);

    expect((await store.getIntegration(rec.id))?.isActive).toBe(false);
  });

  it("reactivates on install and fills in the company name", async () => {
    const { store, receiver } = setup();
    const rec = await seed(store);
    await mutateIntegration(store, rec.id, NOW, (r) => ({ ...r, isActive: false }));

    await receiver.receive({ ...install, companyName: "Acme Agency" });

    expect(await store.getIntegration(rec.id)).toMatchObject({ isActive: true, companyName: "Acme Agency" });
  });

  it("stores unknown event types as processed with no side effect", async () => {
    const { store, receiver } = setup();
    const rec = await seed(store);

    const result = await receiver.receive({ type: "ContactCreate", id: "evt-9", locationId: "location-1" });

    expect(result).toMatchObject({ status: "accepted", kind: "unknown" });
    if (result.status !== "accepted") return;
    expect(result.event.processed).toBe(true);
    expect(result.event.integrationId).toBeNull();
    expect(await store.getIntegration(rec.id)).toEqual(rec);
  });

  it("rejects malformed events without storing them", async () => {
    const { store, receiver } = setup();
    expect(await receiver.receive({ webhookId: "wh-1" })).toEqual({ status: "rejected", reason: "type: Required" });
    expect(await store.listWebhookEvents(10)).toHaveLength(0);
  });

  it("re-dispatches a stored event that never finished processing", async () => {
    const { store, receiver } = setup();
    const rec = await seed(store);
    await store.recordWebhookEvent({
      externalId: "wh-1",
      eventType: "UNINSTALL",
      tenantId: "location-1",
      integrationId: null,
      payload: uninstall,
      receivedAt: NOW,
    });

    const result = await receiver.receive(uninstall);

    expect(result).toMatchObject({ status: "accepted", duplicate: true });
    expect((await store.getIntegration(rec.id))?.isActive).toBe(false);
  });

  it("hands an install for an unknown tenant to the pending installs", async () => {
    const { installs, receiver } = setup();
    await receiver.receive(install);
    expect(installs.completeFromWebhook).toHaveBeenCalledWith("company-1", "location-1");
  });

  it("accepts an uninstall for a tenant it never saw", async () => {
    const { receiver } = setup();
    const result = await receiver.receive(uninstall);
    expect(result).toMatchObject({ status: "accepted", kind: "uninstall" });
  });
});
