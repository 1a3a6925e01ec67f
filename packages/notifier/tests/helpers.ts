import type { NormalizedListing } from '@internwatch/ingestion';

export function makeListing(externalId: string, overrides: Partial<NormalizedListing> = {}): NormalizedListing {
  return {
    sourceId: 'intern-list',
    externalId,
    url: `https://www.intern-list.com/da-intern-list/${externalId.split(':').pop() ?? ''}`,
    title: 'Data Analyst Intern',
    ...overrides,
    _normalized: true as const,
  };
}
