import { APIError, DecodeError, NetworkError, errorMessage } from './errors.js';
import { parseUpdatesResponse, type Update } from './telegram-schema.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('Telegram');

export const DEFAULT_API_URL = 'https://api.telegram.org';
export const DEFAULT_TIMEOUT_MS = 10000;

export interface TelegramClientConfig {
  token: string;
  apiUrl?: string;
  timeout?: number;
}

export class TelegramClient {
  private baseUrl: string;
  private token: string;
  private timeout: number;

  constructor(config: TelegramClientConfig) {
    // 空 token 照樣送出，由 API 拒絕
    this.token = config.token;
    this.baseUrl = (config.apiUrl || DEFAULT_API_URL).replace(/\/$/, '');
    this.timeout = config.timeout || DEFAULT_TIMEOUT_MS;
  }

  private endpoint(method: string): string {
    return `${this.baseUrl}/bot${this.token}/${method}`;
  }

  /**
   * log 與錯誤訊息中顯示的端點（token 已遮蔽）
   */
  private redacted(method: string): string {
    return `${this.baseUrl}/bot<token>/${method}`;
  }

  private async request(method: string): Promise<{ status: number; body: string }> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(this.endpoint(method), {
        method: 'GET',
        headers: { 'Accept': 'application/json' },
        signal: controller.signal,
      });
      const body = await response.text();
      return { status: response.status, body };
    } catch (error) {
      const reason = controller.signal.aborted
        ? `timed out after ${this.timeout}ms`
        : errorMessage(error);
      throw new NetworkError(`GET ${this.redacted(method)} failed: ${reason}`, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * 取得待處理的更新，保留 API 回傳順序（舊到新）
   * 只發一次請求，不重試也不帶 offset，每次執行都看到相同的 backlog
   */
  async fetchUpdates(): Promise<Update[]> {
    const { status, body } = await this.request('getUpdates');
    logger.debug(`getUpdates answered HTTP ${status} (${body.length} bytes)`);

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (error) {
      throw new DecodeError(
        `getUpdates returned a body that is not JSON (HTTP ${status}): ${errorMessage(error)}`,
        status,
        { cause: error },
      );
    }

    const parsed = parseUpdatesResponse(json);
    if (!parsed.success) {
      throw new DecodeError(`Unexpected getUpdates response (HTTP ${status}): ${parsed.error}`, status);
    }

    const envelope = parsed.data;
    if (!envelope.ok) {
      throw new APIError(envelope.errorCode, envelope.description);
    }
    return envelope.result;
  }
}

/**
 * TelegramClient.fetchUpdates 的單次呼叫版本
 */
export async function fetchUpdates(
  token: string,
  options?: Omit<TelegramClientConfig, 'token'>
): Promise<Update[]> {
  return new TelegramClient({ token, ...options }).fetchUpdates();
}

export default TelegramClient;
