import type { IngestionLogger } from '@internwatch/ingestion';
import type { Logger } from 'pino';

export function createIngestionLogger(logger: Logger): IngestionLogger {
  return {
    info: (message) => logger.info({ event: 'collect_stage' }, message),
    warn: (message) => logger.warn({ event: 'collect_stage' }, message),
    error: (message) => logger.error({ event: 'collect_stage' }, message),
  };
}
