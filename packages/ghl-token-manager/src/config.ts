import { z } from "zod";
import { ConfigError } from "./errors.js";

const DEFAULT_SCOPES = "contacts.readonly contacts.write locations.readonly users.readonly";

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const envSchema = z.object({
  GHL_CLIENT_ID: z.string().min(1, "GHL_CLIENT_ID is required"),
  GHL_CLIENT_SECRET: z.string().min(1, "GHL_CLIENT_SECRET is required"),
  GHL_REDIRECT_URI: z.string().url().default("http://localhost:3000/app/callback/"),
  GHL_SCOPES: z.string().default(DEFAULT_SCOPES),
  GHL_AUTH_URL: z.string().url().default("https://marketplace.gohighlevel.com/oauth/chooselocation"),
  GHL_TOKEN_URL: z.string().url().default("https://services.leadconnectorhq.com/oauth/token"),
  GHL_USER_TYPE: z.enum(["Company", "Location"]).default("Company"),
  GHL_REFRESH_LEAD_TIME: z.coerce.number().int().nonnegative().default(3600),
  GHL_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  GHL_PENDING_INSTALL_TTL: z.coerce.number().int().positive().default(600),
  GHL_WEBHOOK_PUBLIC_KEY: optionalString,
  ADMIN_API_KEY: optionalString,
  INSTALL_SUCCESS_REDIRECT: optionalString,
  DATABASE_URL: optionalString,
  PGSSL: z.enum(["true", "false"]).default("false"),
});

export type UserType = "Company" | "Location";

export interface GhlConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  scopes: string[];
  authUrl: string;
  tokenUrl: string;
  userType: UserType;
  /** `refresh_lead_time`: how long before expiry a proactive refresh kicks in. */
  refreshLeadTimeSeconds: number;
  requestTimeoutMs: number;
  pendingInstallTtlSeconds: number;
  webhookPublicKey?: string;
  adminApiKey?: string;
  installSuccessRedirect?: string;
  databaseUrl?: string;
  pgSsl: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): GhlConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }
  const e = parsed.data;
  return {
    clientId: e.GHL_CLIENT_ID,
    clientSecret: e.GHL_CLIENT_SECRET,
    redirectUri: e.GHL_REDIRECT_URI,
    scopes: e.GHL_SCOPES.split(/\s+/).filter(Boolean),
    authUrl: e.GHL_AUTH_URL,
    tokenUrl: e.GHL_TOKEN_URL,
    userType: e.GHL_USER_TYPE,
    refreshLeadTimeSeconds: e.GHL_REFRESH_LEAD_TIME,
    requestTimeoutMs: e.GHL_REQUEST_TIMEOUT_MS,
    pendingInstallTtlSeconds: e.GHL_PENDING_INSTALL_TTL,
    // PEM keys often arrive with literal \n in env files
    webhookPublicKey: e.GHL_WEBHOOK_PUBLIC_KEY?.replace(/\\n/g, "\n"),
    adminApiKey: e.ADMIN_API_KEY,
    installSuccessRedirect: e.INSTALL_SUCCESS_REDIRECT,
    databaseUrl: e.DATABASE_URL,
    pgSsl: e.PGSSL === "true",
  };
}
