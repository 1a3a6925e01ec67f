import type { NormalizedListing } from '@internwatch/ingestion';
import { formatDigest } from './format.js';
import type { Mailer } from './mailer.js';

export const MISSING_CREDENTIALS_NOTICE = 'Set EMAIL_TO and EMAIL_APP_PASSWORD to send email. Body:';

export type DeliveryResult =
  | { status: 'empty' }
  | { status: 'printed'; count: number }
  | { status: 'sent'; count: number }
  | { status: 'failed'; count: number; error: string };

export interface DeliverOptions {
  /** Without a mailer the digest goes to `write`. */
  mailer?: Mailer;
  now: Date;
  write?: (text: string) => void;
}

const writeStdout = (text: string): void => {
  process.stdout.write(text);
};

/**
 * Send one digest of `listings`, or print it when no mailer is configured.
 * A send failure is returned, not thrown.
 */
export async function deliverDigest(listings: NormalizedListing[], options: DeliverOptions): Promise<DeliveryResult> {
  if (listings.length === 0) {
    return { status: 'empty' };
  }

  const message = formatDigest(listings, { now: options.now });
  const count = listings.length;

  if (!options.mailer) {
    const write = options.write ?? writeStdout;
    write(`${MISSING_CREDENTIALS_NOTICE}\n${message.text}`);
    return { status: 'printed', count };
  }

  try {
    await options.mailer.send(message);
    return { status: 'sent', count };
  } catch (err) {
    return { status: 'failed', count, error: err instanceof Error ? err.message : String(err) };
  }
}
