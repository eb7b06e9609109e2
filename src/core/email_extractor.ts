import { isErrorText } from '../tools/errors.js';
import type { LlmStageDeps } from './llm.js';
import { renderPrompt } from './prompts.js';

/** Sentinel for "the goal names no recipient". */
export const NO_RECIPIENT = 'none';

/**
 * Pulls an explicit e-mail address out of the goal, or returns NO_RECIPIENT.
 * Anything the generator says that lacks an "@" is read as NO_RECIPIENT,
 * and a goal without an "@" is not sent to the generator at all.
 */
export async function extractEmailAddress(goal: string, deps: LlmStageDeps): Promise<string> {
  const { llm, log } = deps;
  if (!goal.includes('@')) return NO_RECIPIENT;

  const raw = await llm.generate(await renderPrompt('email_extractor', { goal }), { responseFormat: 'text' });
  const candidate = raw.trim();
  const address = !isErrorText(candidate) && candidate.includes('@') ? candidate : NO_RECIPIENT;
  log.debug({ address }, 'recipient_extracted');
  return address;
}
