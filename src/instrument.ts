import * as Sentry from "@sentry/node";

/**
 * Initialise Sentry for the worker process.
 *
 * Must run before anything that logs through `@/lib/logger`. Without a DSN
 * Sentry stays disabled and the logger calls are dropped.
 *
 * @returns whether Sentry was initialised
 */
export function initInstrumentation(env: NodeJS.ProcessEnv = process.env): boolean {
  if (!env.SENTRY_DSN) {
    return false;
  }

  Sentry.init({
    dsn: env.SENTRY_DSN,

    // Enable structured logging
    enableLogs: true,

    integrations: [
      Sentry.consoleLoggingIntegration({
        levels: ["log", "warn", "error"],
      }),
      // Vercel AI SDK integration - tracks LLM calls, tokens, latency
      Sentry.vercelAIIntegration({
        recordInputs: false,
        recordOutputs: true,
      }),
    ],

    tracesSampler: ({ name, parentSampled }) => {
      if (name.includes("structure")) {
        return 1.0;
      }
      if (typeof parentSampled === "boolean") {
        return parentSampled;
      }
      return env.NODE_ENV === "production" ? 0.1 : 1.0;
    },

    debug: false,
  });

  return true;
}
