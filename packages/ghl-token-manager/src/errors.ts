export type ErrorKind =
  | "InvalidGrant"
  | "NetworkError"
  | "ProviderError"
  | "MalformedWebhook"
  | "InvalidSignature"
  | "NotFound"
  | "Conflict"
  | "Validation"
  | "Unauthorized"
  | "Config";

export abstract class GhlError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly status: number;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON() {
    return { kind: this.kind, message: this.message };
  }
}

/**
 * The provider rejected the grant: the authorization code was used or expired,
 * or the refresh token was revoked. Terminal for a stored integration.
 */
export class InvalidGrantError extends GhlError {
  readonly kind = "InvalidGrant";
  readonly status = 400;

  constructor(message = "Grant is invalid, expired or revoked", readonly providerBody?: unknown) {
    super(message);
  }
}

export class NetworkError extends GhlError {
  readonly kind = "NetworkError";
  readonly status = 502;

  constructor(message: string, readonly underlying?: unknown) {
    super(message);
  }
}

export class ProviderError extends GhlError {
  readonly kind = "ProviderError";
  readonly status = 502;

  constructor(message: string, readonly httpStatus?: number, readonly providerBody?: unknown) {
    super(message);
  }
}

export class MalformedWebhookError extends GhlError {
  readonly kind = "MalformedWebhook";
  readonly status = 400;
}

export class InvalidSignatureError extends GhlError {
  readonly kind = "InvalidSignature";
  readonly status = 401;

  constructor(message = "Webhook signature is missing or invalid") {
    super(message);
  }
}

export class NotFoundError extends GhlError {
  readonly kind = "NotFound";
  readonly status = 404;

  constructor(resource = "Resource") {
    super(`${resource} not found`);
  }
}

export class ConflictError extends GhlError {
  readonly kind = "Conflict";
  readonly status = 409;
}

export class ValidationError extends GhlError {
  readonly kind = "Validation";
  readonly status = 400;
}

export class UnauthorizedError extends GhlError {
  readonly kind = "Unauthorized";
  readonly status = 401;

  constructor(message = "Unauthorized") {
    super(message);
  }
}

export class ConfigError extends GhlError {
  readonly kind = "Config";
  readonly status = 500;

  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
  }
}

export function isTerminal(err: unknown): err is InvalidGrantError {
  return err instanceof InvalidGrantError;
}

export function isTransient(err: unknown): err is NetworkError | ProviderError {
  return err instanceof NetworkError || err instanceof ProviderError;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
