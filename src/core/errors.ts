/**
 * 錯誤類型
 *
 * 執行失敗時一律拋出以下其中一種。沒有更新、沒有訊息或沒有連結
 * 屬於正常結果，不視為錯誤。
 */

export type ErrorCode =
  | 'NETWORK'
  | 'DECODE'
  | 'API'
  | 'INITIALIZATION'
  | 'RENDER'
  | 'CONFIG';

/**
 * Toast 顯示步驟（依 notifier 執行順序）
 */
export const TOAST_STEPS = [
  'initialize',
  'manager',
  'interface',
  'notifier',
  'template',
  'content',
  'show',
] as const;

export type ToastStep = typeof TOAST_STEPS[number];

export type RenderStep = Exclude<ToastStep, 'initialize'>;

export class LinkToastError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LinkToastError';
    this.code = code;
  }
}

/**
 * HTTP 請求本身失敗（連線、DNS、逾時）
 */
export class NetworkError extends LinkToastError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('NETWORK', message, options);
    this.name = 'NetworkError';
  }
}

/**
 * 回應內容不是 JSON，或不符合預期格式
 */
export class DecodeError extends LinkToastError {
  readonly status: number | null;

  constructor(message: string, status: number | null, options?: { cause?: unknown }) {
    super('DECODE', message, options);
    this.name = 'DecodeError';
    this.status = status;
  }
}

/**
 * Bot API 回傳 `ok: false`
 */
export class APIError extends LinkToastError {
  readonly errorCode: number | null;
  readonly description: string | null;

  constructor(errorCode: number | null, description: string | null) {
    const detail = [errorCode, description].filter((part) => part !== null).join(' ');
    super('API', detail ? `Failed to get updates: ${detail}` : 'Failed to get updates');
    this.name = 'APIError';
    this.errorCode = errorCode;
    this.description = description;
  }
}

export class InitializationError extends LinkToastError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INITIALIZATION', message, options);
    this.name = 'InitializationError';
  }
}

export class RenderError extends LinkToastError {
  readonly step: RenderStep;

  constructor(step: RenderStep, message: string, options?: { cause?: unknown }) {
    super('RENDER', message, options);
    this.name = 'RenderError';
    this.step = step;
  }
}

export class ConfigError extends LinkToastError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG', message, options);
    this.name = 'ConfigError';
  }
}

export function isLinkToastError(error: unknown): error is LinkToastError {
  return error instanceof LinkToastError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
