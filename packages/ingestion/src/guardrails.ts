import type { GuardrailOptions, NormalizedListing } from './types.js';

const WORK_HOURS_PER_YEAR = 2080;

const NON_US_LOCATION =
  /\b(canada|ontario|quebec|toronto|vancouver|calgary|uk|united kingdom|london|europe|india|australia|brisbane)\b/i;

/**
 * Whether a printed salary ("$25-$30/hr", "$66,362-$83,000/yr") starts at or above `minHourly` per hour.
 * Yearly figures are converted at 2080 hours. Unparseable values fail.
 */
export function meetsMinPay(salary: string | undefined, minHourly: number): boolean {
  if (!salary) return false;

  const normalized = salary.replace(/,/g, '').trim().toUpperCase();
  const match = normalized.match(/^\$?\s*(\d+(?:\.\d+)?)(?:\s*-\s*\$?\s*\d+(?:\.\d+)?)?\s*\/\s*(HR|HOUR|YR|YEAR)\b/);
  if (!match) return false;

  const low = Number(match[1]);
  const unit = match[2];
  const hourly = unit === 'YR' || unit === 'YEAR' ? low / WORK_HOURS_PER_YEAR : low;

  return hourly >= minHourly;
}

/**
 * False when the location names a place outside the US; true otherwise, including when empty.
 */
export function isUsLocation(location: string | undefined): boolean {
  if (!location?.trim()) return true;
  return !NON_US_LOCATION.test(location);
}

export type GuardrailVerdict = { pass: true } | { pass: false; reason: string };

/**
 * A listing without a salary fails the pay check whenever a minimum is set.
 */
export function checkGuardrails(listing: NormalizedListing, options: GuardrailOptions = {}): GuardrailVerdict {
  const minHourlyPay = options.minHourlyPay ?? 0;

  if (minHourlyPay > 0 && !meetsMinPay(listing.salary, minHourlyPay)) {
    return {
      pass: false,
      reason: listing.salary ? `pay below $${minHourlyPay}/hr: ${listing.salary}` : 'no pay listed',
    };
  }

  if (options.usOnly && !isUsLocation(listing.location)) {
    return { pass: false, reason: `outside US: ${listing.location ?? ''}` };
  }

  return { pass: true };
}
