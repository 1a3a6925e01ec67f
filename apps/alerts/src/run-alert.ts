import { collect, type CollectResult, type GuardrailOptions, type SeenStore } from '@internwatch/ingestion';
import { deliverDigest, type DeliveryResult, type Mailer } from '@internwatch/notifier';
import type { Parser } from '@internwatch/parser-sdk';
import type { Logger } from 'pino';
import { createIngestionLogger } from './observability/ingestion-logger.js';

export interface RunAlertOptions {
  parsers: Parser[];
  store: SeenStore;
  logger: Logger;
  mailer?: Mailer;
  now?: Date;
  windowMinutes?: number;
  guardrails?: GuardrailOptions;
  write?: (text: string) => void;
}

export interface RunAlertResult {
  collected: CollectResult;
  delivery: DeliveryResult;
}

/**
 * One alert run: load seen ids, collect, persist, then deliver.
 *
 * The updated seen set is saved before the digest goes out, so a failed send is reported
 * but never re-sends the same listings on the next run.
 */
export async function runAlert(options: RunAlertOptions): Promise<RunAlertResult> {
  const { parsers, store, logger, mailer, windowMinutes, guardrails, write } = options;
  const now = options.now ?? new Date();

  const seen = await store.load();
  logger.info({ event: 'seen_loaded', seen: seen.size }, `Loaded ${seen.size} seen identifiers`);

  const collected = await collect(parsers, {
    seen,
    now,
    windowMinutes,
    guardrails,
    logger: createIngestionLogger(logger),
  });

  for (const listing of collected.fresh.slice(0, 20)) {
    logger.info(
      { event: 'listing_new', sourceId: listing.sourceId, externalId: listing.externalId },
      listing.title,
    );
  }

  await store.save(collected.seen);
  logger.info({ event: 'seen_saved', seen: collected.seen.size }, `Saved ${collected.seen.size} seen identifiers`);

  const delivery = await deliverDigest(collected.fresh, { mailer, now, write });

  if (delivery.status === 'failed') {
    logger.error({ event: 'delivery_failed', count: delivery.count, error: delivery.error }, 'Email send failed');
  } else {
    logger.info({ event: 'delivery_settled', delivery: delivery.status }, `Delivery ${delivery.status}`);
  }

  return { collected, delivery };
}
