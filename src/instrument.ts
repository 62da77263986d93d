import * as Sentry from '@sentry/node';

import type { Config } from './config/index.js';

/**
 * Initialise Sentry when the config carries a DSN.
 * Without one, error tracking stays off and capture calls are no-ops.
 *
 * @returns whether Sentry was initialised
 */
export function initSentry(sentry: Config['sentry'], fallbackEnvironment: string): boolean {
  if (!sentry) {
    console.log('Sentry DSN not configured, error tracking disabled');
    return false;
  }

  const environment = sentry.environment || fallbackEnvironment;
  Sentry.init({
    dsn: sentry.dsn,
    environment,
    tracesSampleRate: sentry.tracesSampleRate,
    integrations: [Sentry.onUnhandledRejectionIntegration()],
  });

  console.log(`Sentry initialized for environment: ${environment}`);
  return true;
}

// Re-exported for the error handler
export { Sentry };
