import { z } from 'zod';

/** One article as it appears in a newsletter. Never persisted. */
export const articleSchema = z.object({
  title: z.string().min(1),
  link: z.string().url(),
  summary: z.string(),
});

export type Article = z.infer<typeof articleSchema>;
