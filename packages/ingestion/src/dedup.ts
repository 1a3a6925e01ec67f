import type { NormalizedListing, DedupOutcome, DedupResult } from './types.js';
import type { SeenSet } from './seen.js';

/**
 * Split listings into those to notify and those already seen.
 *
 * - Identifier already in `seen` → skip
 * - Identifier repeated within this batch → skip (first occurrence wins)
 * - Otherwise → notify, and the identifier joins the returned set
 */
export function dedup(listings: NormalizedListing[], seen: SeenSet): DedupResult {
  const outcomes: DedupOutcome[] = [];
  const notified = new Set<string>();

  for (const listing of listings) {
    const id = listing.externalId;

    if (seen.has(id)) {
      outcomes.push({ action: 'skip', listing, reason: `already notified: ${id}` });
      continue;
    }

    if (notified.has(id)) {
      outcomes.push({ action: 'skip', listing, reason: `duplicate in batch: ${id}` });
      continue;
    }

    notified.add(id);
    outcomes.push({ action: 'notify', listing });
  }

  return { outcomes, seen: seen.union(notified) };
}

/**
 * Latest first by `postedAt`. Listings without a date go last; ties keep input order.
 */
export function sortLatestFirst(listings: NormalizedListing[]): NormalizedListing[] {
  return listings
    .map((listing, index) => ({ listing, index }))
    .sort((a, b) => {
      const at = a.listing.postedAt?.getTime();
      const bt = b.listing.postedAt?.getTime();

      if (at === undefined && bt === undefined) return a.index - b.index;
      if (at === undefined) return 1;
      if (bt === undefined) return -1;
      return bt - at || a.index - b.index;
    })
    .map(({ listing }) => listing);
}
