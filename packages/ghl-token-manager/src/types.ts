import type { UserType } from "./config.js";

export type TenantType = "Location" | "Company";

/** One credential set per installed tenant (location or company). */
export interface IntegrationRecord {
  id: string;
  tenantId: string;
  tenantType: TenantType;
  companyId: string | null;
  companyName: string;
  locationName: string;
  userId: string;
  userEmail: string;
  userType: UserType | null;
  isBulkInstallation: boolean;

  accessToken: string;
  refreshToken: string;
  refreshTokenId: string | null;
  tokenType: string;
  scope: string[];
  issuedAt: Date;
  expiresAt: Date;

  isActive: boolean;
  lastRefreshAttemptAt: Date | null;
  lastRefreshError: string | null;

  installedAt: Date;
  lastUsedAt: Date | null;
  updatedAt: Date;

  /** Optimistic-lock counter; bumped by every compare-and-swap write. */
  version: number;
  /** While in the future, one caller owns the right to spend the refresh token. */
  refreshLeaseUntil: Date | null;
}

/** What the provider hands back from either grant. */
export interface TokenSet {
  accessToken: string;
  /** Absent when the provider chose not to rotate it. */
  refreshToken?: string;
  refreshTokenId?: string;
  expiresIn: number;
  tokenType: string;
  scope: string[];
  userType?: UserType;
  companyId?: string;
  locationId?: string;
  userId?: string;
  isBulkInstallation: boolean;
  approvedLocations: string[];
}

export interface WebhookEvent {
  id: string;
  /** Provider-assigned event id, used to detect redelivery. */
  externalId: string;
  eventType: string;
  tenantId: string | null;
  integrationId: string | null;
  payload: Record<string, unknown>;
  receivedAt: Date;
  processed: boolean;
  processedAt: Date | null;
}

/** A consumed authorization code whose tenant the user still has to pick. */
export interface PendingInstall {
  correlationId: string;
  tokens: TokenSet;
  companyId: string | null;
  userId: string | null;
  choices: string[];
  createdAt: Date;
  expiresAt: Date;
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
