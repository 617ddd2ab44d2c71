import * as Sentry from "@sentry/node";

/**
 * Structured logger using Sentry.logger
 *
 * Calls are no-ops until `Sentry.init({ enableLogs: true })` has run
 * (see `src/instrument.ts`).
 *
 * @example
 * ```ts
 * import { logger, fmt } from "@/lib/logger";
 *
 * logger.info("Layer persisted", { documentId, depth: 1, count: 12 });
 * logger.warn("Anchor is short", { anchor, length: anchor.length });
 *
 * // Template literal formatting (creates searchable attributes)
 * logger.info(fmt`Structured document ${documentId} into ${nodeCount} nodes`);
 * ```
 */
export const logger = Sentry.logger;

// Re-export for template literal formatting
export const fmt = Sentry.logger.fmt;
