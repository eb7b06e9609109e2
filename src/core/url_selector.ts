import type { LlmStageDeps } from './llm.js';
import { renderPrompt } from './prompts.js';

/**
 * Keeps the lines that start with "http" once trimmed, in the order given.
 */
export function parseUrlList(raw: string): string[] {
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.startsWith('http'));
}

/**
 * Asks the generator which result pages are worth reading.
 * An empty list is a normal outcome and sends the turn down the snippet-only path.
 */
export async function selectUrls(goal: string, searchResults: string, deps: LlmStageDeps): Promise<string[]> {
  const { llm, log } = deps;
  const prompt = await renderPrompt('url_selector', { goal, search_results: searchResults });
  const urls = parseUrlList(await llm.generate(prompt, { responseFormat: 'text' }));
  log.debug({ urls }, 'urls_selected');
  return urls;
}

/** Snippet-only summary: no browsing, no email. */
export async function summarizeSnippets(goal: string, searchResults: string, deps: LlmStageDeps): Promise<string> {
  const { llm, log } = deps;
  log.debug('Could not identify promising URLs to browse; summarizing from search results');
  const prompt = await renderPrompt('snippet_summary', { goal, search_results: searchResults });
  return llm.generate(prompt, { responseFormat: 'text' });
}
