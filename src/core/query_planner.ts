import { isErrorText } from '../tools/errors.js';
import type { LlmStageDeps } from './llm.js';
import { renderPrompt } from './prompts.js';

/**
 * Removes double quotes, curly quotes and backticks anywhere, and single
 * quotes only at the ends so apostrophes inside words survive.
 */
export function cleanQuery(raw: string): string {
  return raw
    .trim()
    .replace(/["“”„`]/g, '')
    .replace(/^['‘’]+|['‘’]+$/g, '')
    .trim();
}

/**
 * Turns the goal and the rendered history into a short search query.
 * Word count is left to the generator; when generation fails the goal
 * itself is searched.
 */
export async function planSearchQuery(goal: string, history: string, deps: LlmStageDeps): Promise<string> {
  const { llm, log } = deps;
  const prompt = await renderPrompt('query_planner', { goal, history });
  const raw = await llm.generate(prompt, { responseFormat: 'text' });
  if (isErrorText(raw)) {
    log.warn({ reason: raw }, 'query_planning_failed_using_goal');
    return cleanQuery(goal);
  }
  const query = cleanQuery(raw);
  log.debug({ query }, 'search_query_planned');
  return query;
}
