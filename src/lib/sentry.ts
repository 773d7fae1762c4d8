import * as Sentry from "@sentry/node";

let sentryEnabled = false;

/**
 * Initialize Sentry error tracking
 * Should be called before the Express app is built
 */
export function initSentry(dsn: string | null, environment: string): void {
  if (!dsn) {
    console.warn("⚠️ SENTRY_DSN not set - error tracking disabled");
    return;
  }

  Sentry.init({
    dsn,
    environment,
    release: "1.0.0", // Match package.json version

    // Performance monitoring - sample 10% in production, 100% in dev
    tracesSampleRate: environment === "production" ? 0.1 : 1.0,

    beforeSend(event) {
      if (event.request?.headers) {
        delete event.request.headers["authorization"];
        delete event.request.headers["cookie"];
      }
      return event;
    },

    // Domain rejections are answered with 4xx and are not errors
    ignoreErrors: ["Rate limit exceeded", "Route not found"],
  });

  sentryEnabled = true;
  console.log("✅ Sentry error tracking initialized");
}

export function isSentryEnabled(): boolean {
  return sentryEnabled;
}

/**
 * Capture an exception with additional context
 */
export function captureError(
  error: unknown,
  context?: {
    tags?: Record<string, string>;
    extra?: Record<string, unknown>;
  },
): void {
  if (!sentryEnabled) return;
  Sentry.captureException(error, {
    tags: context?.tags,
    extra: context?.extra,
  });
}

/**
 * Capture a message (for warnings, info)
 */
export function captureMessage(
  message: string,
  level: "info" | "warning" | "error" = "info",
  extra?: Record<string, unknown>,
): void {
  if (!sentryEnabled) return;
  Sentry.captureMessage(message, {
    level,
    extra,
  });
}

export { Sentry };
