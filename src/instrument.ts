import * as Sentry from "@sentry/node";

Sentry.init({
  dsn: process.env.SENTRY_DSN,
  environment: process.env.NODE_ENV,
  release: process.env.SENTRY_RELEASE,
  enableLogs: true,
  tracesSampleRate: 0.2,
  integrations: [
    Sentry.httpIntegration(),
    Sentry.expressIntegration(),
    Sentry.zodErrorsIntegration(),
  ],
  sendDefaultPii: false,
  beforeSendTransaction: transaction =>
    // Ignore health check transactions
    // eslint-disable-next-line unicorn/no-null
    transaction.transaction === "GET /health" ? null : transaction,
});
