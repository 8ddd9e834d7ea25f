import pino, { type Logger } from "pino";

const isProduction = process.env.NODE_ENV === "production";

// Secrets that must never reach a log line, at any depth we commonly log
const SECRET_FIELDS = [
  "access_token",
  "refresh_token",
  "accessToken",
  "refreshToken",
  "client_secret",
  "clientSecret",
  "authorization",
  "x-admin-key",
  "code",
];

const redactPaths = SECRET_FIELDS.flatMap((field) => [
  field,
  `*.${field}`,
  `req.headers.${field}`,
  `req.query.${field}`,
]);

export const logger: Logger = pino({
  level: process.env.LOG_LEVEL || (isProduction ? "info" : "debug"),
  base: {
    service: "ghl-oauth",
    env: process.env.NODE_ENV || "development",
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => ({ level: label }),
  },
  redact: {
    paths: redactPaths,
    censor: "[REDACTED]",
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
});

export type Component =
  | "oauth"
  | "refresh"
  | "install"
  | "webhook"
  | "store"
  | "http"
  | "refresher"
  | "migrate";

export function componentLogger(component: Component): Logger {
  return logger.child({ component });
}

export type { Logger };
