import dotenv from 'dotenv';

dotenv.config();

/** Fixed path; must match the URL registered with Telegram at startup. */
export const WEBHOOK_PATH = '/webhook';

const DEFAULT_PORT = 8080;
const DEFAULT_OPENAI_MODEL = 'gpt-4.1';
const DEFAULT_OPENAI_REQUEST_TIMEOUT_MS = 120_000;
const DEFAULT_LOG_LEVEL = 'info';

export interface AppEnv {
  port: number;
  telegramBotToken: string;
  /** Base URL the webhook is registered under. Registration is skipped when unset. */
  publicUrl?: string;
  /** Checked against X-Telegram-Bot-Api-Secret-Token when set. */
  telegramSecretToken?: string;
  openaiApiKey: string;
  openaiModel: string;
  /** Request timeout in ms for the completion call. */
  openaiRequestTimeoutMs: number;
  logLevel: string;
}

function requiredEnv(source: NodeJS.ProcessEnv, name: string): string {
  const value = source[name];
  if (!value) {
    throw new Error(`${name} environment variable is not set`);
  }
  return value;
}

function optionalEnv(source: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = source[name]?.trim();
  return value ? value : undefined;
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
  const rawPort = source.PORT ?? String(DEFAULT_PORT);
  const port = Number(rawPort);

  if (!Number.isFinite(port) || port <= 0) {
    throw new Error(`PORT must be a positive number, got "${rawPort}"`);
  }

  const publicUrl = optionalEnv(source, 'PUBLIC_URL')?.replace(/\/+$/, '');

  return {
    port,
    telegramBotToken: requiredEnv(source, 'TELEGRAM_BOT_TOKEN'),
    publicUrl: publicUrl || undefined,
    telegramSecretToken: optionalEnv(source, 'TELEGRAM_SECRET_TOKEN'),
    openaiApiKey: requiredEnv(source, 'OPENAI_API_KEY'),
    openaiModel: optionalEnv(source, 'OPENAI_MODEL') ?? DEFAULT_OPENAI_MODEL,
    openaiRequestTimeoutMs: parsePositiveInt(
      source.OPENAI_REQUEST_TIMEOUT_MS,
      DEFAULT_OPENAI_REQUEST_TIMEOUT_MS,
    ),
    logLevel: optionalEnv(source, 'LOG_LEVEL') ?? DEFAULT_LOG_LEVEL,
  };
}

function parsePositiveInt(value: string | undefined, defaultVal: number): number {
  if (value === undefined || value === '') return defaultVal;
  const n = Number(value);
  if (!Number.isFinite(n) || n < 1) return defaultVal;
  return n;
}
