export { formatDigest, formatListing, formatEastern } from './format.js';
export type { DigestMessage, FormatDigestOptions } from './format.js';
export {
  createSmtpMailer,
  createNodemailerTransport,
  DEFAULT_SMTP_HOST,
  DEFAULT_SMTP_PORT,
} from './mailer.js';
export type { Mailer, MailTransport, SmtpSettings, TransportFactory } from './mailer.js';
export { deliverDigest, MISSING_CREDENTIALS_NOTICE } from './deliver.js';
export type { DeliveryResult, DeliverOptions } from './deliver.js';
