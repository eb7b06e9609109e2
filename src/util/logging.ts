import pino, { type Logger } from 'pino';
import { scrubMessage, scrubPII } from './redact.js';

export type { Logger };

/**
 * Creates a pino logger writing to stderr, with PII redaction unless LOG_LEVEL=debug.
 */
export function createLogger(level: string = process.env.LOG_LEVEL ?? 'info'): Logger {
  const redactEnabled = level !== 'debug';
  const highlightMsg = level === 'debug';

  const decorate = (value: string): string => {
    if (!highlightMsg) return value;
    const trimmed = value.trim();
    if (!trimmed) return value;
    return `✦ ${trimmed} ✦`;
  };

  // Scrub arguments before they reach the destination
  return pino(
    {
      level,
      hooks: {
        logMethod(args, method) {
          const scrubbed = args.map((a: unknown) => {
            if (typeof a === 'string') return decorate(scrubMessage(a, redactEnabled));
            return scrubPII(a, redactEnabled);
          });
          method.apply(this, scrubbed as Parameters<typeof method>);
        },
      },
    },
    pino.destination(2),
  );
}
