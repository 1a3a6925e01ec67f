const RELATIVE_AGE_PATTERN = /(\d+)\s*(?:hours?|hrs?|h|minutes?|mins?|m)\s+ago/i;

export interface RelativeAge {
  minutes: number;
  label: string;
}

/**
 * Find a relative posting age such as "2 hours ago", "2h ago" or "30 mins ago" in `text`.
 */
export function parseRelativeAge(text: string): RelativeAge | undefined {
  const match = text.match(RELATIVE_AGE_PATTERN);
  if (!match) return undefined;

  const value = Number(match[1]);
  const label = match[0].trim();
  const minutes = /min|\dm\b|\sm\b/i.test(label) ? value : value * 60;

  return { minutes, label };
}
