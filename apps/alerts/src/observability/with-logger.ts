import type { Logger } from 'pino';
import { ensureRunId } from './trace.js';

interface SerializedError {
  name?: string;
  message: string;
  stack?: string;
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: String(error),
  };
}

export interface WithRunLoggerOptions<TResult> {
  logger: Logger;
  runId?: string;
  context?: Record<string, unknown>;
  summary?: (result: TResult) => Record<string, unknown>;
  run: (runLogger: Logger) => Promise<TResult>;
}

/**
 * Log start, completion or failure of one alert run around `run`.
 * The child logger handed to `run` carries the run id.
 */
export async function withRunLogger<TResult>({
  logger,
  runId,
  context,
  summary,
  run,
}: WithRunLoggerOptions<TResult>): Promise<TResult> {
  const id = ensureRunId(runId);
  const startedAt = Date.now();
  const runLogger = logger.child({ runId: id, ...context });

  runLogger.info({ event: 'run_started' }, 'Run started');

  try {
    const result = await run(runLogger);
    runLogger.info(
      {
        event: 'run_completed',
        durationMs: Date.now() - startedAt,
        ...(summary ? summary(result) : {}),
      },
      'Run completed',
    );
    return result;
  } catch (error) {
    runLogger.error(
      {
        event: 'run_failed',
        durationMs: Date.now() - startedAt,
        error: serializeError(error),
      },
      'Run failed',
    );
    throw error;
  }
}
