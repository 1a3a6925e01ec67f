import { randomUUID } from 'node:crypto';

export function ensureRunId(runId?: string): string {
  if (runId && runId.trim().length > 0) {
    return runId;
  }

  return randomUUID();
}
