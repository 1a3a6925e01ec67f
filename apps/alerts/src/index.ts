import { FileSeenStore } from '@internwatch/ingestion';
import { createSmtpMailer } from '@internwatch/notifier';
import { loadConfig } from './config.js';
import { createAlertLogger } from './observability/logger.js';
import { serializeError, withRunLogger } from './observability/with-logger.js';
import { runAlert, type RunAlertResult } from './run-alert.js';
import { parsers } from './sources.js';

async function main(): Promise<number> {
  const logger = createAlertLogger();
  const config = loadConfig();

  if (!config.email) {
    logger.warn({ event: 'email_disabled' }, 'EMAIL_TO or EMAIL_APP_PASSWORD is not set; new listings will be printed');
  }

  const result = await withRunLogger<RunAlertResult>({
    logger,
    context: { seenFile: config.seenFile },
    summary: (r) => ({
      fresh: r.collected.fresh.length,
      skipped: r.collected.skipped,
      sourceErrors: r.collected.totalErrors,
      delivery: r.delivery.status,
    }),
    run: (runLogger) =>
      runAlert({
        parsers,
        store: new FileSeenStore(config.seenFile),
        logger: runLogger,
        mailer: config.email ? createSmtpMailer(config.email) : undefined,
        windowMinutes: config.windowMinutes,
        guardrails: config.guardrails,
      }),
  });

  return result.delivery.status === 'failed' ? 1 : 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('[alert] Fatal error:', serializeError(error));
    process.exitCode = 1;
  },
);
