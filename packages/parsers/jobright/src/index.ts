import * as cheerio from 'cheerio';
import { z } from 'zod';
import {
  defineParser,
  fetchText,
  parseRelativeAge,
  type ParseContext,
  type ParseResult,
  type RawListing,
} from '@internwatch/parser-sdk';

const MINISITE_URLS = [
  'https://jobright.ai/minisites-jobs/intern/us/data_analysis',
  'https://jobright.ai/minisites-jobs/intern/us/aiml',
  'https://jobright.ai/minisites-jobs/intern/us/business_analyst',
];
const SEARCH_URL = 'https://jobright.ai/jobs/data-scientist-intern-jobs-in-united-states';
const JOB_INFO_URL = 'https://jobright.ai/jobs/info/';
const REQUEST_TIMEOUT_MS = 30_000;
const SEARCH_CONTEXT_CHARS = 120;
const DEFAULT_TITLE = 'Data Analysis Intern';
const DEFAULT_SEARCH_TITLE = 'Data Scientist Intern';

const epochMsSchema = z.union([z.number().int().positive(), z.string().regex(/^\d+$/).transform(Number)]);

const jobrightItemSchema = z.object({
  id: z.string().min(1),
  postedDate: epochMsSchema,
  title: z.string().nullish(),
  company: z.string().nullish(),
  applyUrl: z.string().nullish(),
  salary: z.string().nullish(),
  location: z.string().nullish(),
});

type JobrightItem = z.infer<typeof jobrightItemSchema>;

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stripQuery(url: string): string {
  return url.split('?')[0]!;
}

function resolveUrl(item: JobrightItem): string {
  const applyUrl = item.applyUrl?.trim() ?? '';
  return stripQuery(applyUrl.startsWith('http') ? applyUrl : `${JOB_INFO_URL}${item.id}`);
}

function toRawListing(item: JobrightItem, raw: JsonRecord): RawListing {
  return {
    sourceId: 'jobright',
    externalId: `jobright:${item.id}`,
    url: resolveUrl(item),
    title: item.title?.trim() || DEFAULT_TITLE,
    company: item.company?.trim() || undefined,
    location: item.location?.trim() || undefined,
    salary: item.salary?.trim() || undefined,
    postedAt: new Date(item.postedDate),
    raw,
  };
}

function readInitialJobs(html: string): unknown[] {
  const $ = cheerio.load(html);
  const payload = $('script#__NEXT_DATA__').first().html();
  if (!payload) return [];

  let data: unknown;
  try {
    data = JSON.parse(payload.trim());
  } catch {
    return [];
  }

  const props = isRecord(data) ? data.props : undefined;
  const pageProps = isRecord(props) ? props.pageProps : undefined;
  const initialJobs = isRecord(pageProps) ? pageProps.initialJobs : undefined;

  return Array.isArray(initialJobs) ? initialJobs : [];
}

/**
 * Extract listings from a minisite's `__NEXT_DATA__` payload (`props.pageProps.initialJobs`).
 * Items without an id or a posting timestamp are skipped.
 */
export function parseJobrightNextData(html: string): RawListing[] {
  const listings: RawListing[] = [];

  for (const value of readInitialJobs(html)) {
    if (!isRecord(value)) continue;

    const parsed = jobrightItemSchema.safeParse(value);
    if (!parsed.success) continue;

    listings.push(toRawListing(parsed.data, value));
  }

  return listings;
}

/**
 * Fallback for the search page: job links paired with a nearby relative age
 * ("2 hours ago") and an optional "[Title]".
 */
export function parseJobrightSearchPage(html: string, now: Date): RawListing[] {
  const listings: RawListing[] = [];
  const seen = new Set<string>();

  for (const match of html.matchAll(/https:\/\/jobright\.ai\/jobs\/info\/([a-f0-9]+)/g)) {
    const id = match[1]!;
    if (seen.has(id)) continue;

    const index = match.index ?? 0;
    const start = Math.max(0, index - SEARCH_CONTEXT_CHARS);
    const end = Math.min(html.length, index + match[0].length + SEARCH_CONTEXT_CHARS);
    const chunk = html.slice(start, end);

    const age = parseRelativeAge(chunk);
    if (!age) continue;

    const title = chunk.match(/\[([^\]]+)\]/)?.[1]?.trim() || DEFAULT_SEARCH_TITLE;

    seen.add(id);
    listings.push({
      sourceId: 'jobright',
      externalId: `jobright:${id}`,
      url: `${JOB_INFO_URL}${id}`,
      title,
      postedAt: new Date(now.getTime() - age.minutes * 60_000),
      postedLabel: age.label,
    });
  }

  return listings;
}

export async function parse(context: ParseContext = {}): Promise<ParseResult> {
  const now = context.now ?? new Date();
  const listings: RawListing[] = [];
  const seenIds = new Set<string>();

  for (const url of MINISITE_URLS) {
    const html = await fetchText(url, { timeoutMs: REQUEST_TIMEOUT_MS });
    for (const listing of parseJobrightNextData(html)) {
      if (seenIds.has(listing.externalId)) continue;
      seenIds.add(listing.externalId);
      listings.push(listing);
    }
  }

  // Minisite items report pay and location; the search page shows neither.
  if (listings.length > 0) {
    return { listings, guardrails: true };
  }

  const html = await fetchText(SEARCH_URL, { timeoutMs: REQUEST_TIMEOUT_MS });
  return { listings: parseJobrightSearchPage(html, now) };
}

export const jobrightParser = defineParser({
  manifest: {
    id: 'jobright',
    name: 'Jobright internship minisites',
    version: '0.1.0',
    urls: [...MINISITE_URLS, SEARCH_URL],
  },
  parse,
});
