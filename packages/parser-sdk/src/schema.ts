import { z } from 'zod';

export const rawListingSchema = z.object({
  sourceId: z.string().min(1),
  externalId: z.string().min(1),
  url: z.string().url(),
  title: z.string().trim().min(1),
  company: z.string().optional(),
  location: z.string().optional(),
  salary: z.string().optional(),
  postedAt: z.date().optional(),
  postedAtPrecision: z.literal('day').optional(),
  postedLabel: z.string().optional(),
  raw: z.record(z.string(), z.unknown()).optional(),
});

export type ValidatedRawListing = z.infer<typeof rawListingSchema>;

export interface ValidateRawListingsOptions {
  onInvalid?: (issues: z.ZodIssue[], listing: unknown) => void;
}

export function validateRawListings(listings: unknown[], options?: ValidateRawListingsOptions): ValidatedRawListing[] {
  const valid: ValidatedRawListing[] = [];

  for (const listing of listings) {
    const result = rawListingSchema.safeParse(listing);
    if (result.success) {
      valid.push(result.data);
    } else {
      options?.onInvalid?.(result.error.issues, listing);
    }
  }

  return valid;
}
