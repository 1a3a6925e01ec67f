export interface RawListing {
  sourceId: string;
  /** Stable identifier, unique across sources: `<sourceId>:<source-local id>`. */
  externalId: string;
  url: string;
  title: string;
  company?: string;
  location?: string;
  /** Pay as the source prints it, e.g. `$25-$30/hr`. */
  salary?: string;
  postedAt?: Date;
  /** `day` when the source publishes only a calendar date; `postedAt` is then midnight UTC of that date. */
  postedAtPrecision?: 'day';
  /** Posting time as the source shows it, e.g. `February 13, 2026` or `2 hours ago`. */
  postedLabel?: string;
  raw?: Record<string, unknown>;
}

export interface ParserManifest {
  id: string;
  name: string;
  version: string;
  urls: string[];
}

export interface ParseContext {
  now?: Date;
}

export interface ParseResult {
  listings: RawListing[];
  /**
   * Set when these listings report pay and location, so the pay and location guardrails apply.
   * Pages that publish neither leave it unset and their listings are not screened.
   */
  guardrails?: boolean;
}

export interface Parser {
  manifest: ParserManifest;
  parse(context?: ParseContext): Promise<ParseResult>;
}
