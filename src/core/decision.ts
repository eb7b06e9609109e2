import type { Logger } from 'pino';
import type { TextGenerator } from './llm.js';
import { isErrorText } from '../tools/errors.js';

/**
 * A yes/no question put to the generator. The answer counts as "yes" only
 * when it contains the token "yes" (any case); every other reply is "no".
 * `onError` is the verdict used when the generator itself failed.
 */
export interface YesNoQuestion {
  name: string;
  prompt: string;
  onError: boolean;
}

export function readYesNo(answer: string): boolean {
  return answer.toLowerCase().includes('yes');
}

export async function askYesNo(llm: TextGenerator, question: YesNoQuestion, log: Logger): Promise<boolean> {
  const answer = await llm.generate(question.prompt, { responseFormat: 'text' });
  if (isErrorText(answer)) {
    log.warn({ question: question.name, answer, verdict: question.onError }, 'yes_no_generation_failed');
    return question.onError;
  }
  const verdict = readYesNo(answer);
  log.debug({ question: question.name, answer: answer.slice(0, 80), verdict }, 'yes_no_decision');
  return verdict;
}
