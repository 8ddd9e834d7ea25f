// apps/server/src/webhooks.ts
import express, { Router } from 'express';
import {
  InvalidSignatureError,
  MalformedWebhookError,
  verifyWebhookSignature,
} from '@ghl-oauth/token-manager';
import type { Services } from './services.js';
import { wrap } from './middleware.js';

/**
 * Mounted before the JSON parser: the signature covers the raw bytes, so the
 * body is parsed here only after it has been checked.
 */
export default function webhookRouter({ config, webhooks }: Services) {
  const router = Router();

  router.post(
    '/app/webhook/',
    express.raw({ type: '*/*', limit: '1mb' }),
    wrap(async (req, res) => {
      const raw = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);

      if (config.webhookPublicKey) {
        const signature = req.get('x-wh-signature') ?? '';
        if (!verifyWebhookSignature(raw, signature, config.webhookPublicKey)) throw new InvalidSignatureError();
      }

      let payload: unknown;
      try {
        payload = JSON.parse(raw.toString('utf8'));
      } catch {
        throw new MalformedWebhookError('Webhook body is not valid JSON');
      }

      const result = await webhooks.receive(payload);
      if (result.status === 'rejected') throw new MalformedWebhookError(result.reason);

      return res.json({
        ok: true,
        event_id: result.event.id,
        kind: result.kind,
        duplicate: result.duplicate,
        processed: result.event.processed,
      });
    }),
  );

  return router;
}
