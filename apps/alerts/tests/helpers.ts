import { Writable } from 'node:stream';
import pino, { type Logger } from 'pino';
import { SeenSet, type SeenStore } from '@internwatch/ingestion';

export class MemorySeenStore implements SeenStore {
  saves = 0;

  constructor(public current: SeenSet = new SeenSet()) {}

  async load(): Promise<SeenSet> {
    return this.current;
  }

  async save(seen: SeenSet): Promise<void> {
    this.saves++;
    this.current = seen;
  }
}

export interface CapturedLogger {
  logger: Logger;
  records: () => Array<Record<string, unknown>>;
}

/**
 * A pino logger writing JSON lines into memory.
 */
export function captureLogger(): CapturedLogger {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      lines.push(...chunk.toString('utf-8').split('\n').filter(Boolean));
      callback();
    },
  });

  const logger = pino({ level: 'info', messageKey: 'message' }, stream);

  return {
    logger,
    records: () => lines.map((line) => JSON.parse(line) as Record<string, unknown>),
  };
}

export const silentLogger: Logger = pino({ level: 'silent' });
