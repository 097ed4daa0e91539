/**
 * 執行設定
 *
 * 啟動時從環境變數讀取一次（dotenv 已載入 .env 之後）。
 * Bot token 可以為空：照常執行，由 API 拒絕。
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';
import { DEFAULT_API_URL, DEFAULT_TIMEOUT_MS } from './telegram-client.js';
import { DEFAULT_APP_ID } from './toast/powershell-platform.js';

export interface AppConfig {
  telegramToken: string;
  telegramApiUrl: string;
  requestTimeoutMs: number;
  toastAppId: string;
  powershellPath: string;
}

const EnvSchema = z.object({
  TELEGRAM_BOT_TOKEN: z.string().default(''),
  TELEGRAM_API_URL: z
    .string()
    .url()
    .default(DEFAULT_API_URL)
    .transform(url => url.replace(/\/$/, '')),
  TELEGRAM_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  TOAST_APP_ID: z.string().min(1).default(DEFAULT_APP_ID),
  POWERSHELL_PATH: z.string().min(1).default('powershell.exe'),
});

/**
 * 選填變數未設定或為空白時，都使用預設值
 */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const entries = Object.entries(env).filter(
    (entry): entry is [string, string] => entry[1] !== undefined && entry[1].trim() !== ''
  );
  return Object.fromEntries(entries);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${detail}`);
  }

  const values = parsed.data;
  return {
    telegramToken: values.TELEGRAM_BOT_TOKEN,
    telegramApiUrl: values.TELEGRAM_API_URL,
    requestTimeoutMs: values.TELEGRAM_REQUEST_TIMEOUT_MS,
    toastAppId: values.TOAST_APP_ID,
    powershellPath: values.POWERSHELL_PATH,
  };
}
