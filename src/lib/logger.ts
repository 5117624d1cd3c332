import * as Sentry from "@sentry/node";

export type LogAttributes = Record<string, string | number | boolean | null | undefined>;

/**
 * Render a log record as a single `key=value` console line.
 * Undefined attributes are dropped.
 */
export function formatLogLine(message: string, attributes: LogAttributes = {}): string {
  const pairs = Object.entries(attributes)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${value}`);
  return [`[datasets] ${message}`, ...pairs].join(" ");
}

/**
 * Structured logger: one console line per record, mirrored to Sentry.logger
 * so the same attributes are searchable once `src/instrument.ts` has run.
 * Without a Sentry client the mirror is a no-op.
 *
 * @example
 * ```ts
 * import { logger } from "@/lib/logger";
 *
 * logger.info("Fetch finished", { url, bytes: 1024 });
 * logger.warn("Sampled file is not valid JSON", { split: "dev" });
 * logger.error("Fallback failed", { error: err.message });
 * ```
 */
export const logger = {
  info(message: string, attributes?: LogAttributes): void {
    console.log(formatLogLine(message, attributes));
    Sentry.logger.info(message, attributes);
  },
  warn(message: string, attributes?: LogAttributes): void {
    console.warn(formatLogLine(message, attributes));
    Sentry.logger.warn(message, attributes);
  },
  error(message: string, attributes?: LogAttributes): void {
    console.error(formatLogLine(message, attributes));
    Sentry.logger.error(message, attributes);
  },
};
