import type { ValidatedRawListing } from '@internwatch/parser-sdk';
import type { SeenSet } from './seen.js';

/**
 * After normalization: whitespace collapsed, title and company truncated.
 * Branded type to prevent mixing with raw validated listings.
 */
export interface NormalizedListing extends ValidatedRawListing {
  readonly _normalized: true;
}

/**
 * Outcome for a single listing after the seen-set check.
 */
export type DedupOutcome =
  | { action: 'notify'; listing: NormalizedListing }
  | { action: 'skip'; listing: NormalizedListing; reason: string };

export interface DedupResult {
  outcomes: DedupOutcome[];
  /** Input set plus every notified identifier. */
  seen: SeenSet;
}

export interface GuardrailOptions {
  /** Minimum hourly pay; listings without a salary fail. 0 disables. */
  minHourlyPay?: number;
  usOnly?: boolean;
}

/**
 * Per-stage counts for observability.
 */
export interface StageStats {
  parsed: number;
  validated: number;
  validationDropped: number;
  outsideWindow: number;
  guardrailDropped: number;
  accepted: number;
}

/**
 * Result of collecting from a single parser.
 */
export interface ParserCollectResult {
  parserId: string;
  parserName: string;
  stats: StageStats;
  errors: string[];
  durationMs: number;
}

/**
 * Result of collecting from all parsers.
 */
export interface CollectResult {
  parsers: ParserCollectResult[];
  /** New listings, latest first. */
  fresh: NormalizedListing[];
  skipped: number;
  seen: SeenSet;
  totalErrors: number;
  durationMs: number;
}

export interface CollectOptions {
  seen: SeenSet;
  now?: Date;
  /** Recency window in minutes; 0 or undefined disables it. */
  windowMinutes?: number;
  /** Applied only to parse results that set `guardrails`. */
  guardrails?: GuardrailOptions;
  logger?: IngestionLogger;
}

/**
 * Minimal logger interface; defaults to console.
 */
export interface IngestionLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
