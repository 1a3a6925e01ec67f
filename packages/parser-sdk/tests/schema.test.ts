import { describe, it, expect, vi } from 'vitest';
import { rawListingSchema, validateRawListings } from '../src/schema.js';

const validListing = {
  sourceId: 'intern-list',
  externalId: 'intern-list:data-analyst-intern-acme',
  url: 'https://www.intern-list.com/da-intern-list/data-analyst-intern-acme',
  title: 'Data Analyst Intern',
  company: 'Acme',
  postedAt: new Date('2026-02-13T00:00:00.000Z'),
  postedLabel: 'February 13, 2026',
};

describe('rawListingSchema', () => {
  it('accepts a complete listing', () => {
    expect(rawListingSchema.safeParse(validListing).success).toBe(true);
  });

  it('accepts a listing without optional fields', () => {
    const result = rawListingSchema.safeParse({
      sourceId: 'jobright',
      externalId: 'jobright:abc123',
      url: 'https://jobright.ai/jobs/info/abc123',
      title: 'ML Intern',
    });
    expect(result.success).toBe(true);
  });

  it('rejects an empty title', () => {
    expect(rawListingSchema.safeParse({ ...validListing, title: '' }).success).toBe(false);
  });

  it('keeps day precision and rejects other precisions', () => {
    const dated = rawListingSchema.safeParse({ ...validListing, postedAtPrecision: 'day' });
    expect(dated.success && dated.data.postedAtPrecision).toBe('day');
    expect(rawListingSchema.safeParse({ ...validListing, postedAtPrecision: 'hour' }).success).toBe(false);
  });

  it('rejects a relative url', () => {
    expect(rawListingSchema.safeParse({ ...validListing, url: '/da-intern-list/x' }).success).toBe(false);
  });
});

describe('validateRawListings', () => {
  it('keeps valid listings and reports invalid ones', () => {
    const onInvalid = vi.fn();
    const valid = validateRawListings([validListing, { ...validListing, externalId: '' }], { onInvalid });

    expect(valid).toHaveLength(1);
    expect(valid[0]!.externalId).toBe('intern-list:data-analyst-intern-acme');
    expect(onInvalid).toHaveBeenCalledTimes(1);
    expect(onInvalid.mock.calls[0]![0][0].path).toEqual(['externalId']);
  });
});

describe('rawListingSchema title', () => {
  it('rejects a whitespace-only title and trims the rest', () => {
    expect(rawListingSchema.safeParse({ ...validListing, title: '   ' }).success).toBe(false);

    const result = rawListingSchema.safeParse({ ...validListing, title: '  Data Analyst Intern ' });
    expect(result.success && result.data.title).toBe('Data Analyst Intern');
  });
});
