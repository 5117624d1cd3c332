import * as Sentry from "@sentry/node";

/**
 * Initialize Sentry for the CLI process. Without a DSN nothing is sent and
 * `logger` only writes to the console.
 */
export function initSentry(dsn: string | undefined): boolean {
  if (!dsn) return false;

  Sentry.init({
    dsn,

    // Enable structured logging (mirrored by src/lib/logger.ts)
    enableLogs: true,

    tracesSampleRate: process.env.NODE_ENV === "production" ? 0.1 : 1.0,

    debug: false,
  });
  return true;
}

/**
 * Drain buffered events before the process exits.
 */
export async function flushSentry(timeoutMs = 2000): Promise<void> {
  await Sentry.flush(timeoutMs);
}
