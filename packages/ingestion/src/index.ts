// Pipeline
export { collect } from './pipeline.js';

// Individual stages
export { validate } from './validate.js';
export { normalize, normalizeWhitespace, MAX_TITLE_LENGTH, MAX_COMPANY_LENGTH } from './normalize.js';
export { isWithinWindow } from './window.js';
export { meetsMinPay, isUsLocation, checkGuardrails } from './guardrails.js';
export type { GuardrailVerdict } from './guardrails.js';
export { dedup, sortLatestFirst } from './dedup.js';
export { SeenSet, FileSeenStore, parseSeenFile, serializeSeenSet } from './seen.js';
export type { SeenStore } from './seen.js';

// Types
export type {
  NormalizedListing,
  DedupOutcome,
  DedupResult,
  GuardrailOptions,
  StageStats,
  ParserCollectResult,
  CollectResult,
  CollectOptions,
  IngestionLogger,
} from './types.js';
