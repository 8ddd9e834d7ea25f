// apps/server/src/oauth.ts
import { Router, type CookieOptions, type Response } from 'express';
import { z } from 'zod';
import { ValidationError, toIntegrationView, type InstallOutcome } from '@ghl-oauth/token-manager';
import type { Services } from './services.js';
import { queryString, wrap } from './middleware.js';

const STATE_COOKIE = 'ghl_oauth_state';

const selectionSchema = z.object({
  correlation_id: z.string().trim().min(1, 'correlation_id is required'),
  tenant_id: z.string().trim().min(1, 'tenant_id is required'),
});

export default function oauthRouter({ config, installs, refresh, clock }: Services) {
  const router = Router();

  // small cookie helper (no session store)
  const cookieOpts: CookieOptions = {
    httpOnly: true,
    sameSite: 'lax',
    secure: /^https:/.test(config.redirectUri),
    maxAge: 10 * 60 * 1000,
    path: '/',
  };

  function respond(res: Response, outcome: InstallOutcome) {
    if (outcome.status === 'TENANT_SELECTION_PENDING') {
      return res.status(202).json({
        status: outcome.status,
        correlation_id: outcome.correlationId,
        choices: outcome.choices,
        expires_at: outcome.expiresAt.toISOString(),
      });
    }
    const { record, created } = outcome;
    if (config.installSuccessRedirect) {
      const url = new URL(config.installSuccessRedirect);
      url.searchParams.set('integration_id', record.id);
      return res.redirect(url.toString());
    }
    const now = clock();
    return res.status(created ? 201 : 200).json({
      status: outcome.status,
      created,
      integration: toIntegrationView(record, refresh.stateOf(record, now), now),
    });
  }

  // Step 1: send the user to the provider's location chooser
  router.get('/app/install/', (_req, res) => {
    const { url, state } = installs.beginInstall();
    res.cookie(STATE_COOKIE, state, cookieOpts);
    return res.redirect(url);
  });

  // Step 2: provider redirects here with ?code=[&locationId=]
  router.get(
    '/app/callback/',
    wrap(async (req, res) => {
      // marketplace-initiated installs never went through /app/install/, so carry no state
      const cookieState: unknown = req.cookies?.[STATE_COOKIE];
      if (typeof cookieState === 'string' && cookieState) {
        if (queryString(req.query.state) !== cookieState) throw new ValidationError('Invalid state');
        res.clearCookie(STATE_COOKIE, { ...cookieOpts, maxAge: undefined });
      }

      const outcome = await installs.handleCallback({
        code: queryString(req.query.code),
        locationId: queryString(req.query.locationId) ?? queryString(req.query.location_id),
      });
      return respond(res, outcome);
    }),
  );

  // Step 3 (deferred installs only): the user picked a tenant
  router.post(
    '/app/install/select/',
    wrap(async (req, res) => {
      const parsed = selectionSchema.safeParse(req.body ?? {});
      if (!parsed.success) throw new ValidationError(parsed.error.issues.map((i) => i.message).join('; '));
      const outcome = await installs.completeSelection(parsed.data.correlation_id, parsed.data.tenant_id);
      return respond(res, outcome);
    }),
  );

  return router;
}
