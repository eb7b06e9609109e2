export type TurnRole = 'user' | 'agent';

export interface TurnRecord {
  role: TurnRole;
  content: string;
}

const LABELS: Record<TurnRole, string> = { user: 'User', agent: 'Agent' };

/**
 * Append-only record of the session. Each completed turn adds exactly
 * two entries: the user's utterance, then the agent's summary.
 */
export class ConversationHistory {
  private readonly records: TurnRecord[] = [];

  get length(): number {
    return this.records.length;
  }

  entries(): readonly TurnRecord[] {
    return [...this.records];
  }

  recordTurn(utterance: string, summary: string): void {
    this.records.push({ role: 'user', content: utterance }, { role: 'agent', content: summary });
  }

  render(): string {
    return this.records.map((r) => `${LABELS[r.role]}: ${r.content}`).join('\n');
  }
}
