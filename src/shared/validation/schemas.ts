import { z } from 'zod';

const TIME_OF_DAY_PATTERN = /^([01]?\d|2[0-3]):[0-5]\d$/;

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
const NotificationFrequencySchema = z.union(
  [z.literal(0), z.literal(1), z.literal(2), z.literal(4), z.literal(6)],
  { message: 'Notification frequency must be one of 0, 1, 2, 4, 6' }
);

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
const UtcOffsetHoursSchema = z
  .number()
  .int('UTC offset must be a whole number of hours')
  .min(-12, 'UTC offset cannot be below -12')
  .max(14, 'UTC offset cannot exceed 14');

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
const ReportedLocalTimeSchema = z
  .string()
  .regex(TIME_OF_DAY_PATTERN, 'Reported local time must be in HH:MM format');

/**
 * Zod schema for completing registration
 *
 * Validation Rules:
 * - chatId: required, integer (the messaging chat that registered)
 * - fullName: required, 1-100 characters
 * - utcOffset: optional, whole hours between -12 and 14
 * - reportedLocalTime: optional, HH:MM; the offset is derived from it
 * - notificationFrequency: optional, one of 0, 1, 2, 4, 6
 *
 * utcOffset and reportedLocalTime are mutually exclusive.
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const RegisterUserSchema = z
  .object({
    chatId: z.number().int('Chat id must be an integer'),
    fullName: z
      .string()
      .trim()
      .min(1, 'Full name is required')
      .max(100, 'Full name cannot exceed 100 characters'),
    utcOffset: UtcOffsetHoursSchema.optional(),
    reportedLocalTime: ReportedLocalTimeSchema.optional(),
    notificationFrequency: NotificationFrequencySchema.optional(),
  })
  .refine((body) => body.utcOffset === undefined || body.reportedLocalTime === undefined, {
    message: 'Provide either utcOffset or reportedLocalTime, not both',
    path: ['utcOffset'],
  });

export type RegisterUserDTO = z.infer<typeof RegisterUserSchema>;

/**
 * Zod schema for the notification settings command (write side)
 *
 * At least one field must be present; utcOffset and reportedLocalTime are
 * mutually exclusive.
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const UpdateNotificationSettingsSchema = z
  .object({
    notificationFrequency: NotificationFrequencySchema.optional(),
    utcOffset: UtcOffsetHoursSchema.optional(),
    reportedLocalTime: ReportedLocalTimeSchema.optional(),
  })
  .refine((body) => body.utcOffset === undefined || body.reportedLocalTime === undefined, {
    message: 'Provide either utcOffset or reportedLocalTime, not both',
    path: ['utcOffset'],
  })
  .refine(
    (body) =>
      body.notificationFrequency !== undefined ||
      body.utcOffset !== undefined ||
      body.reportedLocalTime !== undefined,
    { message: 'At least one setting must be provided' }
  );

export type UpdateNotificationSettingsDTO = z.infer<typeof UpdateNotificationSettingsSchema>;

/**
 * Zod schema for URL parameters containing user ID
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const UserIdParamsSchema = z.object({
  id: z.string().uuid(),
});

export type UserIdParams = z.infer<typeof UserIdParamsSchema>;

/**
 * Zod schema for User response serialization
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const UserResponseSchema = z.object({
  id: z.string().uuid(),
  chatId: z.number().int(),
  fullName: z.string(),
  utcOffset: z.string(),
  notificationFrequency: z.number().int(),
  entitlement: z.string(),
  trialEndsAt: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export type UserResponse = z.infer<typeof UserResponseSchema>;

/**
 * Zod schema for the notification settings command (read side)
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const NotificationSettingsResponseSchema = z.object({
  userId: z.string().uuid(),
  notificationFrequency: z.number().int(),
  enabled: z.boolean(),
  utcOffset: z.string(),
  slots: z.array(z.string()),
  entitlement: z.string(),
  trialDaysRemaining: z.number().int().nullable(),
  pendingTrialWarning: z.string().nullable(),
});

export type NotificationSettingsResponse = z.infer<typeof NotificationSettingsResponseSchema>;

/**
 * Zod schema for error responses
 *
 * Standard error format for all API error responses.
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const ErrorResponseSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.array(z.unknown()).optional(),
  }),
});

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

/**
 * Zod schema for the Telegram Bot API `sendMessage` success body
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const TelegramSendMessageResponseSchema = z.object({
  ok: z.literal(true),
  result: z.object({
    message_id: z.number().int(),
  }),
});

export type TelegramSendMessageResponse = z.infer<typeof TelegramSendMessageResponseSchema>;

/**
 * Zod schema for a Telegram Bot API error body
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const TelegramErrorResponseSchema = z.object({
  ok: z.literal(false),
  error_code: z.number().int().optional(),
  description: z.string(),
});
