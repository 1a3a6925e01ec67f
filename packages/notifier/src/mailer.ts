import nodemailer from 'nodemailer';
import type { DigestMessage } from './format.js';

export const DEFAULT_SMTP_HOST = 'smtp.gmail.com';
export const DEFAULT_SMTP_PORT = 465;

export interface SmtpSettings {
  to: string;
  /** Sender address and SMTP user. */
  from: string;
  /** App password; spaces are ignored, as Gmail displays them in groups of four. */
  password: string;
  host?: string;
  port?: number;
}

export interface Mailer {
  send(message: DigestMessage): Promise<void>;
}

/**
 * The part of a nodemailer transport the mailer calls.
 */
export interface MailTransport {
  sendMail(mail: { from: string; to: string; subject: string; text: string }): Promise<unknown>;
}

export type TransportFactory = (settings: SmtpSettings) => MailTransport;

export const createNodemailerTransport: TransportFactory = (settings) => {
  const port = settings.port ?? DEFAULT_SMTP_PORT;

  return nodemailer.createTransport({
    host: settings.host ?? DEFAULT_SMTP_HOST,
    port,
    secure: port === 465,
    auth: {
      user: settings.from,
      pass: settings.password.replace(/\s+/g, ''),
    },
  });
};

export function createSmtpMailer(settings: SmtpSettings, createTransport: TransportFactory = createNodemailerTransport): Mailer {
  const transport = createTransport(settings);

  return {
    async send(message) {
      await transport.sendMail({
        from: settings.from,
        to: settings.to,
        subject: message.subject,
        text: message.text,
      });
    },
  };
}
