import { z } from 'zod';

const CONTENT_EVENTS = new Set(['create', 'update']);

export const driveNotificationSchema = z
  .object({
    fileId: z.string().trim().min(1, 'fileId is required'),
    eventType: z.string().trim().min(1, 'eventType is required'),
    eventTime: z.string().optional(),
    displayName: z.string().trim().min(1).optional(),
    content: z.string().optional(),
    contentBase64: z.string().min(1).optional(),
    mimeType: z.string().trim().min(1).optional(),
  })
  .superRefine((value, ctx) => {
    if (!CONTENT_EVENTS.has(value.eventType)) {
      return;
    }
    if (value.content === undefined && value.contentBase64 === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['content'],
        message: `${value.eventType} notifications must carry content or contentBase64`,
      });
    }
    if (value.contentBase64 !== undefined && value.mimeType === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['mimeType'],
        message: 'mimeType is required with contentBase64',
      });
    }
  });

export type DriveNotificationDto = z.infer<typeof driveNotificationSchema>;
