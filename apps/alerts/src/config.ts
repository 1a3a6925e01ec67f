import type { GuardrailOptions } from '@internwatch/ingestion';
import type { SmtpSettings } from '@internwatch/notifier';

const DEFAULT_SEEN_FILE = 'seen_ids.txt';
const DEFAULT_WINDOW_MINUTES = 120;
const DEFAULT_MIN_HOURLY_PAY = 25;

export type Env = Record<string, string | undefined>;

export interface AlertConfig {
  seenFile: string;
  /** 0 disables the recency window. */
  windowMinutes: number;
  guardrails: Required<GuardrailOptions>;
  /** Absent when EMAIL_TO or EMAIL_APP_PASSWORD is missing; the digest is printed instead. */
  email?: SmtpSettings;
}

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readNonNegativeIntEnv(env: Env, name: string, fallback: number): number {
  const raw = readString(env, name);
  if (!raw) {
    return fallback;
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0) {
    return fallback;
  }

  return Math.floor(parsed);
}

function readBoolEnv(env: Env, name: string, fallback: boolean): boolean {
  const raw = readString(env, name);
  if (!raw) {
    return fallback;
  }

  const normalized = raw.toLowerCase();
  if (normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on') {
    return true;
  }

  if (normalized === '0' || normalized === 'false' || normalized === 'no' || normalized === 'off') {
    return false;
  }

  return fallback;
}

function readEmailSettings(env: Env): SmtpSettings | undefined {
  const to = readString(env, 'EMAIL_TO');
  const password = readString(env, 'EMAIL_APP_PASSWORD');
  if (!to || !password) {
    return undefined;
  }

  const port = readNonNegativeIntEnv(env, 'SMTP_PORT', 0);

  return {
    to,
    from: readString(env, 'EMAIL_FROM') ?? to,
    password,
    host: readString(env, 'SMTP_HOST'),
    port: port > 0 ? port : undefined,
  };
}

export function loadConfig(env: Env = process.env): AlertConfig {
  return {
    seenFile: readString(env, 'SEEN_FILE') ?? DEFAULT_SEEN_FILE,
    windowMinutes: readNonNegativeIntEnv(env, 'ALERT_WINDOW_MINUTES', DEFAULT_WINDOW_MINUTES),
    guardrails: {
      minHourlyPay: readNonNegativeIntEnv(env, 'MIN_HOURLY_PAY', DEFAULT_MIN_HOURLY_PAY),
      usOnly: readBoolEnv(env, 'US_ONLY', true),
    },
    email: readEmailSettings(env),
  };
}
