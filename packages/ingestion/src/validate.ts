import { validateRawListings, type RawListing, type ValidatedRawListing } from '@internwatch/parser-sdk';

export interface ValidationResult {
  valid: ValidatedRawListing[];
  invalidCount: number;
  /** One line per dropped listing: `<id>: <field> <zod message>`. */
  problems: string[];
}

function describeListing(listing: unknown): string {
  if (typeof listing === 'object' && listing !== null && 'externalId' in listing) {
    const { externalId } = listing;
    if (typeof externalId === 'string' && externalId) return externalId;
  }
  return '(no id)';
}

export function validate(listings: RawListing[]): ValidationResult {
  const problems: string[] = [];
  const valid = validateRawListings(listings, {
    onInvalid: (issues, listing) => {
      const first = issues[0];
      const detail = first ? `${first.path.join('.') || 'listing'} ${first.message}` : 'invalid';
      problems.push(`${describeListing(listing)}: ${detail}`);
    },
  });

  return {
    valid,
    invalidCount: listings.length - valid.length,
    problems,
  };
}
