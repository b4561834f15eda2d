import { createTransport, type SendMailOptions } from 'nodemailer';
import type { SmtpConfig } from './config';
import { EmailConfigError } from './errors';

export const DEFAULT_SMTP_PORT = 587;

export interface MailSender {
  sendMail(message: SendMailOptions): Promise<unknown>;
}

export interface ResolvedSmtp {
  host: string;
  port: number;
  user: string;
  password: string;
  from: string;
  starttls: boolean;
}

/** Checks that every SMTP setting needed to send is present. */
export function resolveSmtp(smtp: SmtpConfig): ResolvedSmtp {
  const { host, user, password, from } = smtp;
  if (!host || !user || !password || !from) {
    const missing = Object.entries({ host, user, password, from })
      .filter(([, value]) => !value)
      .map(([key]) => key);
    throw new EmailConfigError(missing);
  }
  return { host, port: smtp.port ?? DEFAULT_SMTP_PORT, user, password, from, starttls: smtp.starttls };
}

export function createSmtpSender(smtp: ResolvedSmtp): MailSender {
  return createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: false,
    requireTLS: smtp.starttls,
    ignoreTLS: !smtp.starttls,
    auth: { user: smtp.user, pass: smtp.password },
  });
}

export function composeMessage(
  from: string,
  recipients: readonly string[],
  subject: string,
  bodyText: string
): SendMailOptions {
  return { from, to: recipients.join(', '), subject, text: bodyText };
}

/**
 * Sends the plain-text report to every recipient in one message. The sender
 * defaults to an SMTP transport built from the config.
 */
export async function sendReportEmail(
  smtp: SmtpConfig,
  recipients: readonly string[],
  subject: string,
  bodyText: string,
  sender?: MailSender
): Promise<void> {
  const resolved = resolveSmtp(smtp);
  const transport = sender ?? createSmtpSender(resolved);
  await transport.sendMail(composeMessage(resolved.from, recipients, subject, bodyText));
}
