import { z } from 'zod';

/**
 * customers:listAccessibleCustomers body.
 */
export const AccessibleCustomersSchema = z.object({
  resourceNames: z.array(z.string()).default([]),
});

/**
 * One googleAds:search page. Rows are passed through untouched.
 */
export const SearchPageSchema = z.object({
  results: z.array(z.record(z.unknown())).default([]),
  nextPageToken: z.string().optional(),
  fieldMask: z.string().optional(),
});

const KeywordIdeaMetricsSchema = z
  .object({
    avgMonthlySearches: z.union([z.string(), z.number()]).optional(),
    competition: z.string().optional(),
    lowTopOfPageBidMicros: z.union([z.string(), z.number()]).optional(),
    highTopOfPageBidMicros: z.union([z.string(), z.number()]).optional(),
  })
  .passthrough();

/**
 * :generateKeywordIdeas body.
 */
export const KeywordIdeasResponseSchema = z.object({
  results: z
    .array(
      z
        .object({
          text: z.string().optional(),
          keywordIdeaMetrics: KeywordIdeaMetricsSchema.optional(),
        })
        .passthrough(),
    )
    .default([]),
  nextPageToken: z.string().optional(),
});

/**
 * Google API error envelope.
 */
export const AdsErrorBodySchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    status: z.string().optional(),
  }),
});

export type AccessibleCustomers = z.infer<typeof AccessibleCustomersSchema>;
export type SearchPage = z.infer<typeof SearchPageSchema>;
export type KeywordIdeasResponse = z.infer<typeof KeywordIdeasResponseSchema>;
