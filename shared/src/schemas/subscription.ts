import { z } from 'zod';

const MAX_EMAIL_LENGTH = 320;
const MAX_TOKEN_LENGTH = 128;

const emailField = z
  .string({ error: 'Please enter a valid email address.' })
  .transform((s) => s.trim().toLowerCase())
  .pipe(
    z
      .string()
      .min(1, { error: 'Please enter a valid email address.' })
      .max(MAX_EMAIL_LENGTH, { error: 'Please enter a valid email address.' })
      .email({ error: 'Please enter a valid email address.' }),
  );

/** Body for POST /subscribe. Email is trimmed and lower-cased. */
export const subscribeBodySchema = z.object({
  email: emailField,
});

/** Body for POST /unsubscribe when no token is given (email form). */
export const unsubscribeEmailBodySchema = z.object({
  email: emailField,
});

export const unsubscribeTokenSchema = z
  .string()
  .transform((s) => s.trim())
  .pipe(z.string().min(1, { error: 'Token is required' }).max(MAX_TOKEN_LENGTH));

/** Query for GET/POST /unsubscribe (token links from newsletters). */
export const unsubscribeQuerySchema = z.object({
  token: z.string().optional(),
});

/** Form body for POST /unsubscribe. `confirm: "yes"` completes a token unsubscribe. */
export const unsubscribeFormSchema = z.object({
  email: z.string().optional(),
  token: z.string().optional(),
  confirm: z.string().optional(),
});

/** GET /health response. */
export const healthResponseSchema = z.union([
  z.object({ status: z.literal('healthy'), subscribers: z.number().int().min(0) }),
  z.object({ status: z.literal('unhealthy'), error: z.string() }),
]);

export type SubscribeBody = z.infer<typeof subscribeBodySchema>;
export type UnsubscribeForm = z.infer<typeof unsubscribeFormSchema>;
export type HealthResponse = z.infer<typeof healthResponseSchema>;
