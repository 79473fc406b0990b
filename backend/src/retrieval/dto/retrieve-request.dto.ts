import { z } from 'zod';

export const retrieveRequestSchema = z.object({
  query: z
    .string()
    .trim()
    .min(1, 'query is required')
    .max(2000, 'query is too long'),
  k: z.number().int().positive().optional(),
  vectorWeight: z.number().finite().nonnegative().optional(),
  keywordWeight: z.number().finite().nonnegative().optional(),
});

export type RetrieveRequestDto = z.infer<typeof retrieveRequestSchema>;
