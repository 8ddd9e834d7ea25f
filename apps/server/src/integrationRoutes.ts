import { Router, type Request } from 'express';
import { z } from 'zod';
import {
  NotFoundError,
  ValidationError,
  toBulkRefreshView,
  toHealthView,
  toIntegrationView,
  toOutcomeView,
} from '@ghl-oauth/token-manager';
import type { Services } from './services.js';
import { queryFlag, queryString, requireAdminKey, wrap } from './middleware.js';

const uuid = z.string().uuid();

// ids are UUIDs; anything else cannot name an integration
function integrationId(req: Request) {
  const parsed = uuid.safeParse(req.params.integrationId);
  if (!parsed.success) throw new NotFoundError('Integration');
  return parsed.data;
}

const hoursSchema = z.coerce.number().positive().max(24 * 365);

/** Admin surface over stored integrations: manual and bulk refresh, projections, health. */
export default function integrationRouter({ config, store, refresh, clock }: Services) {
  const router = Router();
  router.use(['/app/refresh', '/app/status', '/app/list', '/app/token-health', '/app/bulk-refresh', '/app/get-token'], requireAdminKey(config));

  async function view(id: string) {
    const record = await store.getIntegration(id);
    if (!record) throw new NotFoundError('Integration');
    const now = clock();
    return toIntegrationView(record, refresh.stateOf(record, now), now);
  }

  // Manual refresh; ?force=false only refreshes when the token is due
  router.post(
    '/app/refresh/:integrationId/',
    wrap(async (req, res) => {
      const id = integrationId(req);
      const outcome = await refresh.refreshOne(id, { force: queryFlag(req.query.force, true) });
      return res.json({ ...toOutcomeView(outcome), integration: await view(id) });
    }),
  );

  router.get(
    '/app/status/:integrationId/',
    wrap(async (req, res) => res.json(await view(integrationId(req)))),
  );

  router.get(
    '/app/list/',
    wrap(async (req, res) => {
      const now = clock();
      const records = await store.listIntegrations({ activeOnly: queryFlag(req.query.active) });
      return res.json({
        count: records.length,
        integrations: records.map((r) => toIntegrationView(r, refresh.stateOf(r, now), now)),
      });
    }),
  );

  // ?report=daily adds the daily audit lists; ?expiring_within_hours=N lists soon-to-expire tokens
  router.get(
    '/app/token-health/',
    wrap(async (req, res) => {
      const body: Record<string, unknown> = {};
      if (queryString(req.query.report) === 'daily') {
        const report = await refresh.dailyHealthReport();
        Object.assign(body, toHealthView(report.summary), {
          severely_expired: report.severelyExpired.map((r) => ({
            id: r.id,
            tenant_id: r.tenantId,
            expires_at: r.expiresAt.toISOString(),
          })),
          unused: report.unused.map((r) => ({
            id: r.id,
            tenant_id: r.tenantId,
            last_used_at: r.lastUsedAt?.toISOString() ?? null,
          })),
        });
      } else {
        Object.assign(body, toHealthView(await refresh.healthSummary()));
      }

      const hoursParam = queryString(req.query.expiring_within_hours);
      if (hoursParam !== undefined) {
        const hours = hoursSchema.safeParse(hoursParam);
        if (!hours.success) throw new ValidationError('expiring_within_hours must be a positive number');
        const expiring = await refresh.expiringWithin(hours.data);
        body.expiring = expiring.map((r) => ({ id: r.id, tenant_id: r.tenantId, expires_at: r.expiresAt.toISOString() }));
      }
      return res.json(body);
    }),
  );

  router.post(
    '/app/bulk-refresh/',
    wrap(async (req, res) => {
      const summary = await refresh.refreshAll({
        force: queryFlag(req.query.force),
        dryRun: queryFlag(req.query.dry_run),
      });
      return res.json({ ...toBulkRefreshView(summary), dry_run: queryFlag(req.query.dry_run) });
    }),
  );

  router.get(
    '/app/get-token/:integrationId/',
    wrap(async (req, res) => {
      const token = await refresh.getValidToken(integrationId(req));
      res.setHeader('Cache-Control', 'no-store');
      return res.json({
        access_token: token.accessToken,
        token_type: token.tokenType,
        expires_at: token.expiresAt.toISOString(),
        was_refreshed: token.wasRefreshed,
        state: token.state,
      });
    }),
  );

  return router;
}
