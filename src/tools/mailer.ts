import { createTransport, type Transporter } from 'nodemailer';
import type { Logger } from 'pino';
import type { SmtpConfig } from '../config/agent.js';
import { withTimeout } from '../util/resilience.js';
import { errorMessage } from './errors.js';

export interface MailMessage {
  to: string;
  subject: string;
  body: string;
}

/** Delivers one message; resolves with a success line or an "Error..." string. */
export interface MailSender {
  send(message: MailMessage): Promise<string>;
}

export function createSmtpTransport(cfg: SmtpConfig): Transporter {
  return createTransport({
    host: cfg.host,
    port: cfg.port,
    // implicit TLS on 465, STARTTLS required otherwise
    secure: cfg.secure,
    requireTLS: !cfg.secure,
    auth: { user: cfg.user, pass: cfg.password },
    connectionTimeout: cfg.timeoutMs,
  });
}

export function createMailSender(
  cfg: SmtpConfig | undefined,
  deps: { log: Logger; transport?: Transporter },
): MailSender {
  const { log } = deps;

  return {
    async send({ to, subject, body }) {
      log.debug({ to }, '✉️ Sending email');
      if (!cfg) {
        return 'Error: SMTP settings are not fully configured. Cannot send email.';
      }
      const transport = deps.transport ?? createSmtpTransport(cfg);
      try {
        await withTimeout('smtp', cfg.timeoutMs, () =>
          transport.sendMail({ from: cfg.from, to, subject, text: body }),
        );
        log.info({ to }, 'email_sent');
        return `Email sent successfully to ${to}.`;
      } catch (e) {
        log.warn({ to, error: errorMessage(e) }, 'email_send_failed');
        return `Error sending email: ${errorMessage(e)}`;
      }
    },
  };
}
