import type { Parser } from './types.js';

const SOURCE_ID_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;

/**
 * Declare a parser. The manifest id prefixes every identifier the source emits
 * (`<id>:<local id>`), so it must be a lowercase slug without colons.
 */
export function defineParser<T extends Parser>(parser: T): T {
  const { id } = parser.manifest;
  if (!SOURCE_ID_PATTERN.test(id)) {
    throw new Error(`Invalid parser id "${id}": use lowercase letters, digits and hyphens`);
  }

  return parser;
}
