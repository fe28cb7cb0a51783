import nodemailer from 'nodemailer';
import type { SendMailOptions } from 'nodemailer';
import { Logger } from '../../utils/logger.js';
import type { EmailSettings } from '../../utils/config.js';
import type { INotifier, RenderedMessage } from '../../types/index.js';

export interface SmtpSettings {
  to: string;
  from: string;
  host: string;
  port: number;
  user: string;
  pass: string;
}

// Complete SMTP settings, or null when email is off or a field is missing
export function smtpSettingsFrom(email: EmailSettings): SmtpSettings | null {
  if (!email.enabled) return null;
  const { to, from, smtpHost, smtpPort, smtpUser, smtpPass } = email;
  if (!to || !from || !smtpHost || !smtpPort || !smtpUser || !smtpPass) return null;
  return { to, from, host: smtpHost, port: smtpPort, user: smtpUser, pass: smtpPass };
}

export interface MailTransport {
  sendMail(mail: SendMailOptions): Promise<unknown>;
}

export type TransportFactory = (smtp: SmtpSettings) => MailTransport;

const smtpTransport: TransportFactory = (smtp) =>
  nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: false,
    requireTLS: true,
    auth: { user: smtp.user, pass: smtp.pass },
  });

/**
 * Multipart mail over SMTP with STARTTLS. Never throws: a message that could
 * not be sent is logged and reported as `false`.
 */
export class EmailNotifier implements INotifier {
  private readonly settings: EmailSettings;
  private readonly createTransport: TransportFactory;

  constructor(settings: EmailSettings, createTransport: TransportFactory = smtpTransport) {
    this.settings = settings;
    this.createTransport = createTransport;
  }

  async send(message: RenderedMessage): Promise<boolean> {
    const smtp = smtpSettingsFrom(this.settings);
    if (!smtp) {
      Logger.debug(`Email not configured; skipping "${message.subject}"`);
      return false;
    }
    try {
      const transport = this.createTransport(smtp);
      await transport.sendMail({
        from: smtp.from,
        to: smtp.to,
        subject: message.subject,
        text: message.text,
        ...(message.html ? { html: message.html } : {}),
      });
      Logger.info(`Email sent to ${smtp.to}: ${message.subject}`);
      return true;
    } catch (err) {
      Logger.error(`Failed to send email "${message.subject}"`, err);
      return false;
    }
  }
}
