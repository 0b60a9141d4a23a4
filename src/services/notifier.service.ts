/**
 * Notifier service - HTML report email over SMTP (nodemailer)
 * Delivery failures come back as { ok: false }; send() never throws.
 */

import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import type { MailConfig } from '../config.js';
import { NotifyError } from '../errors.js';

export type SendResult = { ok: true } | { ok: false; error: NotifyError };

export interface Notifier {
  send(subject: string, htmlBody: string): Promise<SendResult>;
}

/** Only the part of a nodemailer transport the notifier calls */
export type MailTransport = Pick<Transporter, 'sendMail'>;

/**
 * "From" string → [address, display name]; name may be ''.
 *   a@b.com | <a@b.com> | Name <a@b.com> | Name<a@b.com>
 */
export function splitAddress(value: string): [string, string] {
  const open = value.indexOf('<');
  if (open === -1) return [value, ''];
  const address = value.slice(open + 1).replace(/>$/, '');
  return [address, value.slice(0, open).trim()];
}

export function createTransport(config: MailConfig): MailTransport {
  return nodemailer.createTransport({
    host: config.smtp.host,
    port: config.smtp.port,
    secure: config.smtp.secure,
    auth: config.smtp.auth,
  });
}

export function createNotifier(
  config: MailConfig,
  transport: MailTransport = createTransport(config)
): Notifier {
  const [address, name] = splitAddress(config.from);

  return {
    async send(subject: string, htmlBody: string): Promise<SendResult> {
      try {
        await transport.sendMail({
          from: name ? { name, address } : address,
          to: config.to,
          subject,
          html: htmlBody,
        });
        return { ok: true };
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        return { ok: false, error: new NotifyError(`Email "${subject}" not sent: ${reason}`, err) };
      }
    },
  };
}
