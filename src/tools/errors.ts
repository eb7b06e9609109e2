/**
 * Failure of a single external call. Raised inside the HTTP helpers and
 * converted to an `Error...` sentinel string at each collaborator's boundary.
 */
export type ExternalCallKind = 'timeout' | 'http' | 'network' | 'parse';

export class ExternalCallError extends Error {
  readonly kind: ExternalCallKind;
  readonly status?: number;
  constructor(kind: ExternalCallKind, message: string, status?: number) {
    super(message);
    this.name = 'ExternalCallError';
    this.kind = kind;
    this.status = status;
  }
}

/**
 * Collaborators report failures as text starting with "Error" instead of throwing.
 */
export function isErrorText(text: string): boolean {
  return text.startsWith('Error');
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function isTimeout(err: unknown): boolean {
  return err instanceof ExternalCallError && err.kind === 'timeout';
}
