/**
 * Human-in-the-loop capability the orchestrator calls mid-turn.
 * The CLI implements it over readline; tests script the answers.
 */
export interface HumanGate {
  /** Show text to the user without expecting an answer. */
  notify(message: string): void | Promise<void>;
  /** Ask a question and resolve with the raw reply. */
  ask(question: string): Promise<string>;
}

const YES_WORDS = ['y', 'yes'];

export function isAffirmative(reply: string): boolean {
  return YES_WORDS.includes(reply.trim().toLowerCase());
}
