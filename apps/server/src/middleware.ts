import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { pinoHttp } from 'pino-http';
import {
  GhlError,
  NotFoundError,
  UnauthorizedError,
  ValidationError,
  componentLogger,
  errorMessage,
  type GhlConfig,
  type RefreshService,
  type ValidToken,
} from '@ghl-oauth/token-manager';

declare global {
  namespace Express {
    interface Locals {
      /** Set by the inbound token middleware on /app/api/* requests. */
      integration?: { id: string; token: ValidToken };
    }
  }
}

const log = componentLogger('http');

export const INTEGRATION_HEADER = 'x-ghl-integration-id';

/** Express 4 does not catch rejected promises; hand them to the error handler. */
export function wrap(handler: (req: Request, res: Response, next: NextFunction) => Promise<unknown>): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

export function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

export function queryFlag(value: unknown, fallback = false): boolean {
  const v = queryString(value)?.toLowerCase();
  if (v === undefined) return fallback;
  return v === 'true' || v === '1' || v === 'yes';
}

export function httpLogger() {
  return pinoHttp({
    logger: log,
    customLogLevel: (_req, res, err) => {
      if (err || res.statusCode >= 500) return 'error';
      if (res.statusCode >= 400) return 'warn';
      return 'info';
    },
    autoLogging: { ignore: (req) => req.url === '/healthz' },
  });
}

// Admin endpoints are open when no ADMIN_API_KEY is configured
export function requireAdminKey(config: Pick<GhlConfig, 'adminApiKey'>): RequestHandler {
  return (req, _res, next) => {
    if (config.adminApiKey && req.get('x-admin-key') !== config.adminApiKey) {
      return next(new UnauthorizedError('Missing or invalid x-admin-key'));
    }
    next();
  };
}

function integrationIdFrom(req: Request): string | undefined {
  const fromBody: unknown =
    typeof req.body === 'object' && req.body !== null ? Reflect.get(req.body, 'integration_id') : undefined;
  return queryString(req.query.integration_id) ?? queryString(fromBody) ?? queryString(req.get(INTEGRATION_HEADER));
}

/**
 * Resolves the caller's integration and makes sure its access token is usable,
 * refreshing just in time. Anything short of a valid token is a 401.
 */
export function tokenMiddleware(refresh: RefreshService): RequestHandler {
  return wrap(async (req, res, next) => {
    const id = integrationIdFrom(req);
    if (!id) throw new UnauthorizedError('integration_id is required');
    try {
      const token = await refresh.getValidToken(id);
      res.locals.integration = { id, token };
    } catch (e) {
      if (e instanceof NotFoundError) throw e;
      log.warn({ integrationId: id, err: errorMessage(e) }, 'no valid token for request');
      throw new UnauthorizedError(`No valid token for integration: ${errorMessage(e)}`);
    }
    next();
  });
}

export function healthHeaders(refresh: RefreshService): RequestHandler {
  return wrap(async (_req, res, next) => {
    const health = await refresh.healthSummary();
    res.setHeader('X-GHL-Token-Health', String(health.healthPercentage));
    res.setHeader('X-GHL-Total-Integrations', String(health.total));
    res.setHeader('X-GHL-Expired-Tokens', String(health.counts.EXPIRED));
    res.setHeader('X-GHL-Needs-Refresh', String(health.counts.NEAR_EXPIRY + health.counts.EXPIRED));
    next();
  });
}

export const notFound: RequestHandler = (_req, _res, next) => next(new NotFoundError('Route'));

function isBodyParseError(err: unknown) {
  return err instanceof SyntaxError && Reflect.get(err, 'type') === 'entity.parse.failed';
}

export const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
  const known: unknown = isBodyParseError(err) ? new ValidationError('Request body is not valid JSON') : err;
  if (known instanceof GhlError) {
    if (known.status >= 500) log.error({ err: known, path: req.path }, known.message);
    return res.status(known.status).json({ error: known.toJSON() });
  }
  log.error({ err, path: req.path }, 'unhandled error');
  res.status(500).json({ error: { kind: 'Internal', message: 'Internal server error' } });
};
