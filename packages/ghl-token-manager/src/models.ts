import { pgTable, uuid, text, timestamp, boolean, integer, jsonb } from "drizzle-orm/pg-core";
import type { TokenSet } from "./types.js";

export const ghlIntegrations = pgTable("ghl_integrations", {
  id: uuid("id").primaryKey().defaultRandom(),
  tenantId: text("tenant_id").notNull().unique(),
  tenantType: text("tenant_type").$type<"Location" | "Company">().notNull(),
  companyId: text("company_id"),
  companyName: text("company_name").notNull().default(""),
  locationName: text("location_name").notNull().default(""),
  userId: text("user_id").notNull().default(""),
  userEmail: text("user_email").notNull().default(""),
  userType: text("user_type").$type<"Company" | "Location">(),
  isBulkInstallation: boolean("is_bulk_installation").notNull().default(false),
  accessToken: text("access_token").notNull(),
  refreshToken: text("refresh_token").notNull(),
  refreshTokenId: text("refresh_token_id"),
  tokenType: text("token_type").notNull().default("Bearer"),
  scope: text("scope").array().notNull().default([]),
  issuedAt: timestamp("issued_at", { withTimezone: true }).notNull(),
  expiresAt: timestamp("expires_at", { withTimezone: true }).notNull(),
  isActive: boolean("is_active").notNull().default(true),
  lastRefreshAttemptAt: timestamp("last_refresh_attempt_at", { withTimezone: true }),
  lastRefreshError: text("last_refresh_error"),
  installedAt: timestamp("installed_at", { withTimezone: true }).notNull().defaultNow(),
  lastUsedAt: timestamp("last_used_at", { withTimezone: true }),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  version: integer("version").notNull().default(0),
  refreshLeaseUntil: timestamp("refresh_lease_until", { withTimezone: true }),
});

export const ghlWebhookEvents = pgTable("ghl_webhook_events", {
  id: uuid("id").primaryKey().defaultRandom(),
  externalId: text("external_id").notNull().unique(),
  eventType: text("event_type").notNull(),
  tenantId: text("tenant_id"),
  integrationId: uuid("integration_id").references(() => ghlIntegrations.id),
  payload: jsonb("payload").$type<Record<string, unknown>>().notNull(),
  receivedAt: timestamp("received_at", { withTimezone: true }).notNull().defaultNow(),
  processed: boolean("processed").notNull().default(false),
  processedAt: timestamp("processed_at", { withTimezone: true }),
});

export const ghlPendingInstalls = pgTable("ghl_pending_installs", {
  correlationId: text("correlation_id").primaryKey(),
  tokens: jsonb("tokens").$type<TokenSet>().notNull(),
  companyId: text("company_id"),
  userId: text("user_id"),
  choices: text("choices").array().notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  expiresAt: timestamp("expires_at", { withTimezone: true }).notNull(),
});

export const schema = { ghlIntegrations, ghlWebhookEvents, ghlPendingInstalls };
