import { Router } from 'express';
import { NotFoundError } from '@ghl-oauth/token-manager';
import type { Services } from './services.js';
import { healthHeaders, tokenMiddleware, wrap } from './middleware.js';

/** Routes that act on behalf of an installed tenant. Every request arrives with a usable token. */
export default function apiRouter({ store, refresh }: Services) {
  const router = Router();
  router.use(tokenMiddleware(refresh), healthHeaders(refresh));

  router.get(
    '/whoami/',
    wrap(async (_req, res) => {
      const current = res.locals.integration;
      const record = current ? await store.getIntegration(current.id) : undefined;
      if (!current || !record) throw new NotFoundError('Integration');
      return res.json({
        integration_id: record.id,
        tenant_id: record.tenantId,
        tenant_type: record.tenantType,
        state: current.token.state,
        expires_at: current.token.expiresAt.toISOString(),
        was_refreshed: current.token.wasRefreshed,
      });
    }),
  );

  return router;
}
