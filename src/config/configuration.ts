export type TelegramMode = 'webhook' | 'polling';
export type UnknownChoicePolicy = 'reprompt' | 'terminate';

export interface DatabaseConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
}

export const REQUIRED_ENV_VARS = [
  'TELEGRAM_BOT_TOKEN',
  'DATABASE_URL',
  'RESEND_API_KEY',
  'ADMIN_EMAIL',
  'WEBHOOK_SECRET',
  'PUBLIC_URL',
  'PORT',
] as const;

export const WEBHOOK_PATH = '/api/telegram/webhook';

const DEFAULT_TIMEOUT_MS = 10_000;

function getEnv(name: string): string {
  return process.env[name]?.trim() ?? '';
}

function parsePositiveInt(name: string, defaultValue: number): number {
  const raw = getEnv(name);
  if (!raw) return defaultValue;

  const value = parseInt(raw, 10);
  if (isNaN(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function parseChoice<T extends string>(name: string, allowed: readonly T[], defaultValue: T): T {
  const raw = getEnv(name);
  if (!raw) return defaultValue;

  const match = allowed.find((value) => value === raw);
  if (!match) {
    throw new Error(`${name} must be one of ${allowed.join(', ')}, got "${raw}"`);
  }
  return match;
}

// Parse DATABASE_URL (Supabase/Railway/Heroku style)
export function parseDatabaseUrl(databaseUrl: string): DatabaseConfig {
  let url: URL;
  try {
    url = new URL(databaseUrl);
  } catch {
    throw new Error('DATABASE_URL is not a valid connection string');
  }

  return {
    host: url.hostname,
    port: parseInt(url.port || '5432', 10),
    username: decodeURIComponent(url.username),
    password: decodeURIComponent(url.password),
    database: url.pathname.slice(1), // Remove leading /
  };
}

export type DatabaseSsl = false | { rejectUnauthorized: boolean; ca?: string };

// Certificates are verified only when a CA is supplied
export function buildDatabaseSsl(isProduction: boolean, caCert?: string): DatabaseSsl {
  if (!isProduction) return false;
  return {
    rejectUnauthorized: !!caCert,
    ...(caCert ? { ca: caCert } : {}),
  };
}

export default () => {
  const missing = REQUIRED_ENV_VARS.filter((name) => !getEnv(name));
  if (missing.length > 0) {
    throw new Error(`Missing required environment variables: ${missing.join(', ')}. Bot cannot start.`);
  }

  const publicUrl = getEnv('PUBLIC_URL').replace(/\/+$/, '');

  return {
    nodeEnv: getEnv('NODE_ENV') || 'development',
    port: parsePositiveInt('PORT', 8080),
    database: parseDatabaseUrl(getEnv('DATABASE_URL')),
    databaseCaCert: getEnv('DATABASE_CA_CERT') || undefined,
    redis: {
      host: getEnv('REDIS_HOST') || undefined,
      port: parsePositiveInt('REDIS_PORT', 6379),
      password: getEnv('REDIS_PASSWORD') || undefined,
    },
    telegram: {
      botToken: getEnv('TELEGRAM_BOT_TOKEN'),
      mode: parseChoice<TelegramMode>('TELEGRAM_MODE', ['webhook', 'polling'], 'webhook'),
      webhookSecret: getEnv('WEBHOOK_SECRET'),
      webhookUrl: `${publicUrl}${WEBHOOK_PATH}`,
    },
    mail: {
      resendApiKey: getEnv('RESEND_API_KEY'),
      adminEmail: getEnv('ADMIN_EMAIL'),
      from: getEnv('MAIL_FROM') || 'Parts Bot <bot@example.com>',
      timeoutMs: parsePositiveInt('NOTIFIER_TIMEOUT_MS', DEFAULT_TIMEOUT_MS),
    },
    orders: {
      storeTimeoutMs: parsePositiveInt('STORE_TIMEOUT_MS', DEFAULT_TIMEOUT_MS),
    },
    conversation: {
      unknownChoicePolicy: parseChoice<UnknownChoicePolicy>(
        'UNKNOWN_CHOICE_POLICY',
        ['reprompt', 'terminate'],
        'reprompt',
      ),
    },
    app: {
      shutdownDrainMs: parsePositiveInt('SHUTDOWN_DRAIN_MS', 5000),
    },
  };
};
