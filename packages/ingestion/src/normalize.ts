import type { ValidatedRawListing } from '@internwatch/parser-sdk';
import type { NormalizedListing } from './types.js';

export const MAX_TITLE_LENGTH = 200;
export const MAX_COMPANY_LENGTH = 100;

/**
 * Trim whitespace and collapse multiple spaces.
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max).trim() : text;
}

function optionalText(value: string | undefined, max?: number): string | undefined {
  if (value === undefined) return undefined;
  const cleaned = normalizeWhitespace(value);
  if (!cleaned) return undefined;
  return max === undefined ? cleaned : truncate(cleaned, max);
}

/**
 * Apply all normalizations to a validated raw listing.
 * Pure; no side effects.
 */
export function normalize(listing: ValidatedRawListing): NormalizedListing {
  return {
    ...listing,
    title: truncate(normalizeWhitespace(listing.title), MAX_TITLE_LENGTH),
    company: optionalText(listing.company, MAX_COMPANY_LENGTH),
    location: optionalText(listing.location),
    salary: optionalText(listing.salary),
    postedLabel: optionalText(listing.postedLabel),
    _normalized: true as const,
  };
}
