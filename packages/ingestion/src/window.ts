import { parseRelativeAge } from '@internwatch/parser-sdk';
import type { NormalizedListing } from './types.js';

const MINUTE_MS = 60_000;
const DAY_MS = 24 * 60 * MINUTE_MS;

function utcDay(date: Date): number {
  return Math.floor(date.getTime() / DAY_MS);
}

/**
 * Whether a listing was posted within the last `windowMinutes`.
 *
 * A relative label ("2 hours ago") or an exact `postedAt` is compared against the window.
 * Listings with day precision count as recent on that day and the day after;
 * any other `postedAt` is an exact instant, midnight included.
 */
export function isWithinWindow(listing: NormalizedListing, now: Date, windowMinutes: number): boolean {
  if (windowMinutes <= 0) return true;

  const age = listing.postedLabel ? parseRelativeAge(listing.postedLabel) : undefined;
  if (age && age.minutes <= windowMinutes) {
    return true;
  }

  const postedAt = listing.postedAt;
  if (!postedAt) return false;

  const deltaMs = now.getTime() - postedAt.getTime();
  if (deltaMs >= 0 && deltaMs <= windowMinutes * MINUTE_MS) {
    return true;
  }

  if (deltaMs > 0 && listing.postedAtPrecision === 'day') {
    return utcDay(postedAt) >= utcDay(now) - 1;
  }

  return false;
}
