export type { RawListing, ParserManifest, ParseContext, ParseResult, Parser } from './types.js';
export { rawListingSchema, validateRawListings } from './schema.js';
export type { ValidatedRawListing, ValidateRawListingsOptions } from './schema.js';
export { defineParser } from './factory.js';
export { fetchText, HttpStatusError, DEFAULT_USER_AGENT } from './http.js';
export type { FetchTextOptions } from './http.js';
export { parseRelativeAge } from './time.js';
export type { RelativeAge } from './time.js';
