import { z } from 'zod';

const requiredText = (field: string) =>
  z
    .string({ required_error: `Missing '${field}' field`, invalid_type_error: `'${field}' must be a string` })
    .trim()
    .min(1, { message: `'${field}' cannot be empty` });

// blank or null means "not given"
const optionalText = z
  .string()
  .trim()
  .nullish()
  .transform((v) => v || undefined);

export const chatBodySchema = z.object({
  query: requiredText('query'),
  user_id: requiredText('user_id'),
  session_id: optionalText,
});

export type ChatBody = z.infer<typeof chatBodySchema>;

export const historyQuerySchema = z.object({
  user_id: requiredText('user_id'),
  session_id: optionalText.transform((v) => v ?? 'default'),
});

export const userIdParamSchema = z.object({
  userId: requiredText('userId'),
});
