import { z } from "zod";
import type { InstallationFlow } from "./install.js";
import { componentLogger } from "./logger.js";
import { mutateIntegration, type TokenStore, type WebhookStore } from "./store.js";
import { systemClock, type Clock, type IntegrationRecord, type WebhookEvent } from "./types.js";

const log = componentLogger("webhook");

const optionalText = z.string().trim().min(1).optional().catch(undefined);

const envelopeSchema = z.object({
  type: z.string().trim().min(1, "type is required"),
  webhookId: optionalText,
  eventId: optionalText,
  id: z.union([z.string().trim().min(1), z.number()]).optional().catch(undefined),
  locationId: optionalText,
  location_id: optionalText,
  location: z.object({ id: optionalText }).optional().catch(undefined),
  data: z.object({ locationId: optionalText }).optional().catch(undefined),
  companyId: optionalText,
  companyName: optionalText,
});

const payloadSchema = z.record(z.unknown());

const INSTALL_TYPES = new Set(["install", "app.installed"]);
const UNINSTALL_TYPES = new Set(["uninstall", "app.uninstalled"]);

interface NotificationBase {
  externalId: string;
  eventType: string;
  /** Location when the payload names one, else the company. */
  tenantId: string | null;
  payload: Record<string, unknown>;
}

export type WebhookNotification =
  | (NotificationBase & {
      kind: "install";
      companyId: string | null;
      locationId: string | null;
      companyName: string | null;
    })
  | (NotificationBase & { kind: "uninstall" })
  | (NotificationBase & { kind: "unknown" });

export type ParsedWebhook = { ok: true; notification: WebhookNotification } | { ok: false; reason: string };

export function parseWebhook(raw: unknown): ParsedWebhook {
  const payload = payloadSchema.safeParse(raw);
  if (!payload.success) return { ok: false, reason: "Webhook body must be a JSON object" };

  const envelope = envelopeSchema.safeParse(raw);
  if (!envelope.success) {
    return { ok: false, reason: envelope.error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ") };
  }
  const e = envelope.data;

  const externalId = e.webhookId ?? e.eventId ?? (e.id === undefined ? undefined : String(e.id));
  if (!externalId) return { ok: false, reason: "event id is required (webhookId, eventId or id)" };

  const locationId = e.locationId ?? e.location_id ?? e.location?.id ?? e.data?.locationId ?? null;
  const companyId = e.companyId ?? null;
  const base: NotificationBase = {
    externalId,
    eventType: e.type,
    tenantId: locationId ?? companyId,
    payload: payload.data,
  };

  const type = e.type.toLowerCase();
  if (INSTALL_TYPES.has(type)) {
    return {
      ok: true,
      notification: { ...base, kind: "install", companyId, locationId, companyName: e.companyName ?? null },
    };
  }
  if (UNINSTALL_TYPES.has(type)) return { ok: true, notification: { ...base, kind: "uninstall" } };
  return { ok: true, notification: { ...base, kind: "unknown" } };
}

export type ReceiveResult =
  | { status: "accepted"; kind: WebhookNotification["kind"]; event: WebhookEvent; duplicate: boolean }
  | { status: "rejected"; reason: string };

/**
 * Records provider notifications and applies their status side effects.
 * Delivery is at least once, so every side effect sets a value rather than
 * flipping it.
 */
export class WebhookReceiver {
  private readonly clock: Clock;

  constructor(
    private readonly store: TokenStore & WebhookStore,
    private readonly installs?: Pick<InstallationFlow, "completeFromWebhook">,
    opts: { clock?: Clock } = {},
  ) {
    this.clock = opts.clock ?? systemClock;
  }

  async receive(raw: unknown): Promise<ReceiveResult> {
    const parsed = parseWebhook(raw);
    if (!parsed.ok) {
      log.warn({ reason: parsed.reason }, "rejected malformed webhook");
      return { status: "rejected", reason: parsed.reason };
    }
    const n = parsed.notification;
    const now = this.clock();

    const { event, duplicate } = await this.store.recordWebhookEvent({
      externalId: n.externalId,
      eventType: n.eventType,
      tenantId: n.tenantId,
      integrationId: null,
      payload: n.payload,
      receivedAt: now,
    });

    if (event.processed) {
      log.info({ externalId: n.externalId, eventType: n.eventType }, "duplicate webhook, already processed");
      return { status: "accepted", kind: n.kind, event, duplicate };
    }

    const integration = await this.dispatch(n, now);
    const integrationId = integration?.id ?? null;
    const marked = await this.store.markWebhookProcessed(event.id, integrationId, now);
    log.info(
      { externalId: n.externalId, eventType: n.eventType, kind: n.kind, integrationId, duplicate },
      "webhook processed",
    );
    return {
      status: "accepted",
      kind: n.kind,
      // a concurrent redelivery may have marked it first
      event: marked ?? { ...event, processed: true, processedAt: now, integrationId },
      duplicate,
    };
  }

  private async dispatch(n: WebhookNotification, now: Date): Promise<IntegrationRecord | undefined> {
    if (n.kind === "unknown" || !n.tenantId) return undefined;

    const existing = await this.store.getIntegrationByTenant(n.tenantId);

    if (n.kind === "uninstall") {
      if (!existing) return undefined;
      return mutateIntegration(this.store, existing.id, now, (cur) =>
        cur.isActive ? { ...cur, isActive: false, refreshLeaseUntil: null } : undefined,
      );
    }

    if (!existing) {
      if (this.installs && n.companyId && n.locationId) {
        return this.installs.completeFromWebhook(n.companyId, n.locationId);
      }
      return undefined;
    }

    return mutateIntegration(this.store, existing.id, now, (cur) => {
      const companyId = cur.companyId ?? n.companyId;
      const companyName = cur.companyName || n.companyName || "";
      if (cur.isActive && companyId === cur.companyId && companyName === cur.companyName) return undefined;
      return { ...cur, isActive: true, companyId, companyName };
    });
  }
}
