import { describe, it, expect } from 'vitest';
import { formatDigest, formatEastern, formatListing } from '../src/format.js';
import { makeListing } from './helpers.js';

const NOW = new Date('2026-02-16T13:00:00.000Z');

describe('formatEastern', () => {
  it('renders standard time', () => {
    expect(formatEastern(new Date('2026-02-16T12:30:00.000Z'))).toBe('Feb 16, 2026 07:30 AM EST');
  });

  it('renders daylight time', () => {
    expect(formatEastern(new Date('2026-07-04T16:00:00.000Z'))).toBe('Jul 04, 2026 12:00 PM EDT');
  });
});

describe('formatListing', () => {
  it('prefers the label the source printed', () => {
    const listing = makeListing('intern-list:bi-intern-globex', {
      title: 'BI Intern',
      company: 'Globex',
      postedLabel: 'February 13, 2026',
      postedAt: new Date('2026-02-13T00:00:00.000Z'),
    });

    expect(formatListing(listing)).toBe(
      '- BI Intern | Globex\n  Posted: February 13, 2026\n  https://www.intern-list.com/da-intern-list/bi-intern-globex\n',
    );
  });

  it('falls back to Eastern time, then to unknown', () => {
    const dated = makeListing('jobright:a1', {
      url: 'https://jobright.ai/jobs/info/a1',
      postedAt: new Date('2026-02-16T12:30:00.000Z'),
    });
    const undated = makeListing('jobright:b2', { url: 'https://jobright.ai/jobs/info/b2' });

    expect(formatListing(dated)).toBe(
      '- Data Analyst Intern\n  Posted: Feb 16, 2026 07:30 AM EST\n  https://jobright.ai/jobs/info/a1\n',
    );
    expect(formatListing(undated)).toContain('  Posted: unknown\n');
  });
});

describe('formatDigest', () => {
  it('builds subject and body in the given order', () => {
    const listings = [
      makeListing('intern-list:first', { title: 'First Intern', company: 'Acme', postedLabel: 'February 14, 2026' }),
      makeListing('intern-list:second', { title: 'Second Intern', company: 'Globex', postedLabel: 'February 13, 2026' }),
    ];

    const digest = formatDigest(listings, { now: NOW });

    expect(digest.subject).toBe('Internship alert: 2 new listings');
    expect(digest.text).toBe(
      'New internship listings (latest first)\n' +
        '(Current time: Feb 16, 2026 08:00 AM EST)\n\n' +
        '- First Intern | Acme\n  Posted: February 14, 2026\n  https://www.intern-list.com/da-intern-list/first\n\n' +
        '- Second Intern | Globex\n  Posted: February 13, 2026\n  https://www.intern-list.com/da-intern-list/second\n\n',
    );
  });

  it('uses the singular for one listing', () => {
    expect(formatDigest([makeListing('intern-list:only')], { now: NOW }).subject).toBe('Internship alert: 1 new listing');
  });
});
