import { z } from 'zod';

/**
 * Wire shape the drafting prompt asks for. The subject/body invariant
 * is checked after parsing (see parseEmailDecision).
 */
export const EmailDecisionPayload = z.object({
  send_email: z.boolean(),
  subject: z.string().nullable().optional(),
  body: z.string().nullable().optional(),
});
export type EmailDecisionPayloadT = z.infer<typeof EmailDecisionPayload>;

export type EmailDecision =
  | { sendEmail: false }
  | { sendEmail: true; subject: string; body: string };

export const NO_EMAIL: EmailDecision = { sendEmail: false };
