import type { Parser } from '@internwatch/parser-sdk';
import type {
  CollectOptions,
  CollectResult,
  IngestionLogger,
  NormalizedListing,
  ParserCollectResult,
  StageStats,
} from './types.js';
import { validate } from './validate.js';
import { normalize } from './normalize.js';
import { isWithinWindow } from './window.js';
import { checkGuardrails } from './guardrails.js';
import { dedup, sortLatestFirst } from './dedup.js';

const MAX_LOGGED_PROBLEMS = 5;

const defaultLogger: IngestionLogger = {
  info: (msg) => console.log(msg),
  warn: (msg) => console.warn(msg),
  error: (msg) => console.error(msg),
};

interface ParserRun {
  result: ParserCollectResult;
  accepted: NormalizedListing[];
}

/**
 * Collect listings from a single parser.
 * Stages: parse → validate → normalize → window → guardrails
 */
async function collectParser(parser: Parser, options: CollectOptions, now: Date): Promise<ParserRun> {
  const { logger = defaultLogger, windowMinutes = 0, guardrails } = options;
  const { id, name } = parser.manifest;
  const start = performance.now();
  const errors: string[] = [];
  const accepted: NormalizedListing[] = [];

  const stats: StageStats = {
    parsed: 0,
    validated: 0,
    validationDropped: 0,
    outsideWindow: 0,
    guardrailDropped: 0,
    accepted: 0,
  };

  try {
    // 1. Parse
    logger.info(`[collect:${id}] Fetching listings from ${name}...`);
    const parseResult = await parser.parse({ now });
    stats.parsed = parseResult.listings.length;
    logger.info(`[collect:${id}] Received ${stats.parsed} listings`);

    // 2. Validate
    const { valid, invalidCount, problems } = validate(parseResult.listings);
    stats.validated = valid.length;
    stats.validationDropped = invalidCount;
    if (invalidCount > 0) {
      logger.warn(`[collect:${id}] ${invalidCount} listings failed validation`);
      for (const problem of problems.slice(0, MAX_LOGGED_PROBLEMS)) {
        logger.warn(`[collect:${id}]   ${problem}`);
      }
    }

    // 3. Normalize, 4. Window, 5. Guardrails
    for (const listing of valid.map(normalize)) {
      if (!isWithinWindow(listing, now, windowMinutes)) {
        stats.outsideWindow++;
        continue;
      }

      if (parseResult.guardrails) {
        const verdict = checkGuardrails(listing, guardrails);
        if (!verdict.pass) {
          stats.guardrailDropped++;
          logger.info(`[collect:${id}] Dropped ${listing.externalId}: ${verdict.reason}`);
          continue;
        }
      }

      accepted.push(listing);
    }

    stats.accepted = accepted.length;
    logger.info(
      `[collect:${id}] ${stats.accepted} listings accepted (${stats.outsideWindow} outside window, ${stats.guardrailDropped} filtered)`,
    );
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    errors.push(message);
    logger.error(`[collect:${id}] Error: ${message}`);
  }

  return {
    result: {
      parserId: id,
      parserName: name,
      stats,
      errors,
      durationMs: performance.now() - start,
    },
    accepted: errors.length > 0 ? [] : accepted,
  };
}

/**
 * Run every parser, then drop listings already in `seen` and order the rest latest first.
 * Parsers are processed sequentially; a failing parser does not stop the others.
 * Nothing is persisted here.
 */
export async function collect(parsers: Parser[], options: CollectOptions): Promise<CollectResult> {
  const { logger = defaultLogger } = options;
  const now = options.now ?? new Date();
  const start = performance.now();
  const results: ParserCollectResult[] = [];
  const accepted: NormalizedListing[] = [];

  for (const parser of parsers) {
    const run = await collectParser(parser, options, now);
    results.push(run.result);
    accepted.push(...run.accepted);
  }

  const { outcomes, seen } = dedup(accepted, options.seen);
  const fresh = sortLatestFirst(outcomes.filter((o) => o.action === 'notify').map((o) => o.listing));
  const skipped = outcomes.length - fresh.length;
  const totalErrors = results.reduce((sum, r) => sum + r.errors.length, 0);

  logger.info(`[collect] Done. ${fresh.length} new listings, ${skipped} already seen, across ${parsers.length} parsers.`);

  if (totalErrors > 0) {
    const failedIds = results.filter((r) => r.errors.length > 0).map((r) => r.parserId);
    logger.error(`[collect] ${totalErrors} parser(s) failed: ${failedIds.join(', ')}`);
  }

  return {
    parsers: results,
    fresh,
    skipped,
    seen,
    totalErrors,
    durationMs: performance.now() - start,
  };
}
