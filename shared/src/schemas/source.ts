import { z } from 'zod';

const keywordsSchema = z.array(z.string().min(1)).min(1, { error: 'At least one keyword is required' });

/** Anchors matched by a CSS selector (listing pages). */
export const selectorRuleSchema = z.object({
  type: z.literal('selector'),
  selector: z.string().min(1),
});

/** Headings whose text mentions a keyword (digest pages). Summary comes from the sibling content. */
export const headingsRuleSchema = z.object({
  type: z.literal('headings'),
  keywords: keywordsSchema,
  summaryMaxLength: z.number().int().min(20).optional(),
});

/** strong/b/em text mentioning a keyword. Used when a digest page has no matching headings. */
export const emphasisRuleSchema = z.object({
  type: z.literal('emphasis'),
  keywords: keywordsSchema,
  summaryMaxLength: z.number().int().min(20).optional(),
});

export const extractionRuleSchema = z.discriminatedUnion('type', [
  selectorRuleSchema,
  headingsRuleSchema,
  emphasisRuleSchema,
]);

export const sourceConfigSchema = z.object({
  name: z.string().min(1),
  baseUrl: z.string().url(),
  listingUrl: z.string().url(),
  strategies: z.array(extractionRuleSchema).min(1, { error: 'A source needs at least one extraction rule' }),
  /** Secondary page tried when no rule matches the listing page. */
  fallback: z
    .object({
      url: z.string().url(),
      strategies: z.array(extractionRuleSchema).min(1),
    })
    .optional(),
});

/** Ordered by priority: earlier sources win title dedupe. */
export const sourceCatalogSchema = z.object({
  sources: z.array(sourceConfigSchema).min(1, { error: 'At least one source is required' }),
});

export type ExtractionRule = z.infer<typeof extractionRuleSchema>;
export type SelectorRule = z.infer<typeof selectorRuleSchema>;
export type HeadingsRule = z.infer<typeof headingsRuleSchema>;
export type EmphasisRule = z.infer<typeof emphasisRuleSchema>;
export type SourceConfig = z.infer<typeof sourceConfigSchema>;
export type SourceCatalog = z.infer<typeof sourceCatalogSchema>;
