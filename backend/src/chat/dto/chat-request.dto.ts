import { z } from 'zod';

export const chatMessageRoleSchema = z.enum(['user', 'assistant']);

export type ChatMessageRole = z.infer<typeof chatMessageRoleSchema>;

export const chatHistoryMessageSchema = z.object({
  role: chatMessageRoleSchema,
  content: z.string().trim().min(1, 'message content is required'),
});

export type ChatMessageDto = z.infer<typeof chatHistoryMessageSchema>;

export const chatRequestSchema = z.object({
  question: z
    .string()
    .trim()
    .min(1, 'question is required')
    .max(2000, 'question is too long'),
  topK: z.number().int().positive().max(20).optional(),
  history: z
    .array(chatHistoryMessageSchema)
    .max(50, 'history is too long')
    .optional(),
});

export type ChatRequestDto = z.infer<typeof chatRequestSchema>;
