// Thin HTTP callers for the server's bulk-refresh and token-health endpoints.
// All refresh logic lives server side; this process only decides *when*.
import { z } from 'zod';
import { NetworkError, ProviderError, componentLogger, errorMessage, type Transport } from '@ghl-oauth/token-manager';
import type { RefresherConfig } from './config.js';

const log = componentLogger('refresher');

const bulkSchema = z.object({
  total: z.number(),
  refreshed_count: z.number(),
  failed_count: z.number(),
  invalidated_count: z.number(),
  skipped_count: z.number(),
});

const healthSchema = z.object({
  total: z.number(),
  active: z.number(),
  health_percentage: z.number(),
  counts: z.object({
    FRESH: z.number(),
    NEAR_EXPIRY: z.number(),
    EXPIRED: z.number(),
    INVALID: z.number(),
  }),
  severely_expired: z.array(z.object({ id: z.string(), tenant_id: z.string() })).optional(),
  unused: z.array(z.object({ id: z.string() })).optional(),
});

export type BulkRefreshReport = z.infer<typeof bulkSchema>;
export type HealthReport = z.infer<typeof healthSchema>;

type TriggerConfig = Pick<RefresherConfig, 'apiUrl' | 'adminKey' | 'timeoutMs'>;

async function call<T>(
  cfg: TriggerConfig,
  transport: Transport,
  method: 'GET' | 'POST',
  path: string,
  schema: z.ZodType<T>,
): Promise<T> {
  const headers: Record<string, string> = { Accept: 'application/json' };
  if (cfg.adminKey) headers['x-admin-key'] = cfg.adminKey;

  let res: Response;
  try {
    res = await transport(`${cfg.apiUrl}${path}`, { method, headers, signal: AbortSignal.timeout(cfg.timeoutMs) });
  } catch (e) {
    throw new NetworkError(`${method} ${path} failed: ${errorMessage(e)}`, e);
  }
  if (!res.ok) {
    const text = await res.text();
    throw new ProviderError(`${method} ${path} returned ${res.status}: ${text.slice(0, 200)}`, res.status);
  }
  const parsed = schema.safeParse(await res.json());
  if (!parsed.success) throw new ProviderError(`${method} ${path} returned an unexpected body`, res.status);
  return parsed.data;
}

export async function triggerBulkRefresh(
  cfg: TriggerConfig,
  transport: Transport = (url, init) => fetch(url, init),
): Promise<BulkRefreshReport> {
  const report = await call(cfg, transport, 'POST', '/app/bulk-refresh/', bulkSchema);
  const level = report.failed_count || report.invalidated_count ? 'warn' : 'info';
  log[level](
    {
      total: report.total,
      refreshed: report.refreshed_count,
      failed: report.failed_count,
      invalidated: report.invalidated_count,
      skipped: report.skipped_count,
    },
    'bulk refresh triggered',
  );
  return report;
}

export async function triggerHealthCheck(
  cfg: TriggerConfig,
  transport: Transport = (url, init) => fetch(url, init),
): Promise<HealthReport> {
  const report = await call(cfg, transport, 'GET', '/app/token-health/?report=daily', healthSchema);
  log.info({ ...report.counts, total: report.total, health: report.health_percentage }, 'token health');
  for (const r of report.severely_expired ?? []) {
    log.warn({ integrationId: r.id, tenantId: r.tenant_id }, 'integration expired for over a week');
  }
  return report;
}

/** Weekly pass: a full sweep, then a health read to see what it left behind. */
export async function weeklyMaintenance(
  cfg: TriggerConfig,
  transport: Transport = (url, init) => fetch(url, init),
) {
  const refresh = await triggerBulkRefresh(cfg, transport);
  const health = await triggerHealthCheck(cfg, transport);
  return { refresh, health };
}
