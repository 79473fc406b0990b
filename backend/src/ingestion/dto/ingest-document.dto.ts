import { z } from 'zod';

export const ingestDocumentSchema = z
  .object({
    sourceType: z.enum(['upload', 'drive']).default('upload'),
    sourceKey: z.string().trim().min(1, 'sourceKey is required'),
    displayName: z.string().trim().min(1).max(500).optional(),
    text: z.string().optional(),
    contentBase64: z.string().min(1).optional(),
    mimeType: z.string().trim().min(1).optional(),
  })
  .superRefine((value, ctx) => {
    const hasText = value.text !== undefined;
    const hasContent = value.contentBase64 !== undefined;
    if (hasText === hasContent) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['text'],
        message: 'provide exactly one of text or contentBase64',
      });
    }
    if (hasContent && value.mimeType === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['mimeType'],
        message: 'mimeType is required with contentBase64',
      });
    }
  });

export type IngestDocumentDto = z.infer<typeof ingestDocumentSchema>;
