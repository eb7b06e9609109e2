import type { LlmStageDeps } from './llm.js';
import { renderPrompt } from './prompts.js';
import { formatResearch, type ResearchEntry } from './researcher.js';

/**
 * Writes the user-facing answer from the gathered pages. The verification
 * policy (only items the sources explicitly confirm against every criterion,
 * bullets for lists) lives in the prompt; whatever the generator returns is
 * passed through as-is.
 */
export async function synthesizeSummary(
  goal: string,
  research: readonly ResearchEntry[],
  deps: LlmStageDeps,
): Promise<string> {
  const prompt = await renderPrompt('synthesizer', { goal, aggregated_text: formatResearch(research) });
  const summary = await deps.llm.generate(prompt, { responseFormat: 'text' });
  deps.log.debug({ chars: summary.length }, 'summary_synthesized');
  return summary;
}
