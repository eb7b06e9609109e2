import { EmailDecisionPayload, NO_EMAIL, type EmailDecision } from '../schemas/email.js';
import { isErrorText } from '../tools/errors.js';
import { safeExtractJson, type LlmStageDeps } from './llm.js';
import { renderPrompt } from './prompts.js';
import { formatResearch, type ResearchEntry } from './researcher.js';

export type EmailDecisionOutcome =
  | { ok: true; decision: EmailDecision }
  | { ok: false; reason: string };

/**
 * Validates the drafter's reply. A send decision needs a non-blank subject
 * and body; anything else, including unparseable text, is rejected.
 */
export function parseEmailDecision(raw: string): EmailDecisionOutcome {
  const json = safeExtractJson(raw);
  if (json === undefined) return { ok: false, reason: 'no_json_found' };

  const parsed = EmailDecisionPayload.safeParse(json);
  if (!parsed.success) {
    return { ok: false, reason: `schema_violation: ${parsed.error.issues.map((i) => i.path.join('.') || i.message).join(', ')}` };
  }

  const { send_email, subject, body } = parsed.data;
  if (!send_email) return { ok: true, decision: NO_EMAIL };
  if (!subject?.trim() || !body?.trim()) return { ok: false, reason: 'send_email_without_subject_or_body' };
  return { ok: true, decision: { sendEmail: true, subject: subject.trim(), body: body.trim() } };
}

/**
 * Decides whether the findings deserve an email and drafts it. Any failure
 * (generation error, bad JSON, missing subject/body) means no email; it is
 * logged and never shown to the user.
 */
export async function draftEmail(
  goal: string,
  summary: string,
  research: readonly ResearchEntry[],
  deps: LlmStageDeps,
): Promise<EmailDecision> {
  const { llm, log } = deps;
  const prompt = await renderPrompt('email_drafter', {
    goal,
    summary,
    aggregated_text: formatResearch(research),
  });
  const raw = await llm.generate(prompt, { responseFormat: 'json' });
  if (isErrorText(raw)) {
    log.warn({ reason: raw }, 'email_decision_generation_failed');
    return NO_EMAIL;
  }

  const outcome = parseEmailDecision(raw);
  if (!outcome.ok) {
    log.warn({ reason: outcome.reason, response: raw.slice(0, 200) }, 'email_decision_rejected');
    return NO_EMAIL;
  }
  log.debug({ sendEmail: outcome.decision.sendEmail }, 'email_decision');
  return outcome.decision;
}
