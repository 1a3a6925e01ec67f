import type { NormalizedListing } from '../src/types.js';

export function makeListing(externalId: string, overrides: Partial<NormalizedListing> = {}): NormalizedListing {
  const [sourceId = 'test-source'] = externalId.split(':');
  return {
    sourceId,
    externalId,
    url: `https://listings.example.com/${encodeURIComponent(externalId)}`,
    title: 'Data Analyst Intern',
    company: 'Acme',
    ...overrides,
    _normalized: true as const,
  };
}
