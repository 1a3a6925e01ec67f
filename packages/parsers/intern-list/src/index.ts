import * as cheerio from 'cheerio';
import { defineParser, fetchText, type ParseResult, type RawListing } from '@internwatch/parser-sdk';

const BASE_URL = 'https://www.intern-list.com';
const LIST_PATH = '/da-intern-list/';
const LIST_URL = `${BASE_URL}/da-intern-list`;
const REQUEST_TIMEOUT_MS = 15_000;

const MONTHS: Record<string, number> = {
  january: 0,
  february: 1,
  march: 2,
  april: 3,
  may: 4,
  june: 5,
  july: 6,
  august: 7,
  september: 8,
  october: 9,
  november: 10,
  december: 11,
};

/**
 * Parse a long-form date such as "February 13, 2026" to midnight UTC.
 */
export function parseListDate(text: string): Date | undefined {
  const match = text.trim().match(/^([A-Za-z]+)\s+(\d{1,2}),\s*(\d{4})$/);
  if (!match) return undefined;

  const month = MONTHS[match[1]!.toLowerCase()];
  if (month === undefined) return undefined;

  const day = Number(match[2]);
  const year = Number(match[3]);
  const date = new Date(Date.UTC(year, month, day));

  // Rejects overflow such as "February 30"
  return date.getUTCDate() === day ? date : undefined;
}

function extractSlug(path: string): string | undefined {
  const slug = path.split('?')[0]!.split('/').filter(Boolean).pop();
  return slug && `/${slug}/` !== LIST_PATH ? slug : undefined;
}

function cleanText(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

export function parseInternListHtml(html: string): RawListing[] {
  const $ = cheerio.load(html);
  const listings: RawListing[] = [];
  const seenSlugs = new Set<string>();

  $(`a[href^="${LIST_PATH}"]`).each((_, el) => {
    const anchor = $(el);
    const href = anchor.attr('href');
    if (!href) return;

    const slug = extractSlug(href);
    if (!slug || seenSlugs.has(slug)) return;

    const item = anchor.closest('.w-dyn-item');
    const card = item.length > 0 ? item : anchor;

    const title = cleanText(card.find('p.jobtitle').first().text());
    if (!title) return;

    const postedLabel = cleanText(card.find('p.blogtag').first().text()) || undefined;
    const company = cleanText(card.find('p.companyname_list').first().text()) || undefined;

    const postedAt = postedLabel ? parseListDate(postedLabel) : undefined;

    seenSlugs.add(slug);
    listings.push({
      sourceId: 'intern-list',
      externalId: `intern-list:${slug}`,
      url: `${BASE_URL}${LIST_PATH}${slug}`,
      title,
      company,
      postedAt,
      postedAtPrecision: postedAt ? 'day' : undefined,
      postedLabel,
    });
  });

  return listings;
}

export async function parse(): Promise<ParseResult> {
  const html = await fetchText(LIST_URL, { timeoutMs: REQUEST_TIMEOUT_MS });
  return { listings: parseInternListHtml(html) };
}

export const internListParser = defineParser({
  manifest: {
    id: 'intern-list',
    name: 'intern-list.com (Data Analysis)',
    version: '0.1.0',
    urls: [LIST_URL],
  },
  parse,
});
