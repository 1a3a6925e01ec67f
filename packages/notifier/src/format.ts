import type { NormalizedListing } from '@internwatch/ingestion';

const EASTERN_TIME_ZONE = 'America/New_York';

const easternFormatter = new Intl.DateTimeFormat('en-US', {
  timeZone: EASTERN_TIME_ZONE,
  month: 'short',
  day: '2-digit',
  year: 'numeric',
  hour: '2-digit',
  minute: '2-digit',
  hour12: true,
  timeZoneName: 'short',
});

export interface DigestMessage {
  subject: string;
  text: string;
}

export interface FormatDigestOptions {
  now: Date;
}

/**
 * "Feb 16, 2026 07:30 AM EST"
 */
export function formatEastern(date: Date): string {
  const parts = new Map(easternFormatter.formatToParts(date).map((part) => [part.type, part.value]));
  const get = (type: Intl.DateTimeFormatPartTypes) => parts.get(type) ?? '';

  return `${get('month')} ${get('day')}, ${get('year')} ${get('hour')}:${get('minute')} ${get('dayPeriod')} ${get('timeZoneName')}`;
}

function postedDisplay(listing: NormalizedListing): string {
  if (listing.postedLabel) return listing.postedLabel;
  if (listing.postedAt) return formatEastern(listing.postedAt);
  return 'unknown';
}

export function formatListing(listing: NormalizedListing): string {
  const heading = listing.company ? `${listing.title} | ${listing.company}` : listing.title;
  return `- ${heading}\n  Posted: ${postedDisplay(listing)}\n  ${listing.url}\n`;
}

/**
 * Plain-text digest of new listings, in the order given.
 */
export function formatDigest(listings: NormalizedListing[], options: FormatDigestOptions): DigestMessage {
  const count = listings.length;
  const subject = `Internship alert: ${count} new listing${count === 1 ? '' : 's'}`;

  const header = `New internship listings (latest first)\n(Current time: ${formatEastern(options.now)})\n\n`;
  const text = header + listings.map((listing) => `${formatListing(listing)}\n`).join('');

  return { subject, text };
}
