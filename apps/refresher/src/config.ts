import { z } from 'zod';
import cron from 'node-cron';
import { ConfigError } from '@ghl-oauth/token-manager';

const cronExpr = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .refine((v) => cron.validate(v), { message: 'not a valid cron expression' });

const envSchema = z.object({
  API_URL: z.string().url().default('http://api:3000'),
  ADMIN_API_KEY: z.string().optional(),
  REFRESH_CRON: cronExpr('0 * * * *'),
  HEALTH_CRON: cronExpr('0 6 * * *'),
  WEEKLY_CRON: cronExpr('0 3 * * 0'),
  CRON_TIMEZONE: z.string().optional(),
  TRIGGER_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
});

export interface RefresherConfig {
  apiUrl: string;
  adminKey?: string;
  refreshCron: string;
  healthCron: string;
  weeklyCron: string;
  timezone?: string;
  timeoutMs: number;
}

export function loadRefresherConfig(env: NodeJS.ProcessEnv = process.env): RefresherConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  const e = parsed.data;
  return {
    apiUrl: e.API_URL.replace(/\/+$/, ''),
    adminKey: e.ADMIN_API_KEY || undefined,
    refreshCron: e.REFRESH_CRON,
    healthCron: e.HEALTH_CRON,
    weeklyCron: e.WEEKLY_CRON,
    timezone: e.CRON_TIMEZONE || undefined,
    timeoutMs: e.TRIGGER_TIMEOUT_MS,
  };
}
