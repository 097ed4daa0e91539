/**
 * 統一的 Logger 工具
 *
 * 為所有 log 輸出加入時間戳記，方便追蹤排程執行時的事件順序。
 *
 * 特性：
 * - 時間格式：[YYYY-MM-DD HH:mm:ss]（TZ 時區，未設定或無效時使用主機時區）
 * - 元件前綴：[Telegram]、[Toast] 等
 */

/**
 * 最近一次解析的 TZ 與實際使用的時區
 */
let resolvedZone: { tz: string | undefined; zone: string | undefined } | null = null;

/**
 * 解析 TZ 環境變數
 * POSIX 格式（例如 `:/etc/localtime`、`CET-1CEST`）Intl 不接受，改用主機時區
 */
function resolveTimeZone(): string | undefined {
  const tz = process.env.TZ || undefined;
  if (resolvedZone && resolvedZone.tz === tz) {
    return resolvedZone.zone;
  }

  let zone: string | undefined;
  if (tz) {
    try {
      new Intl.DateTimeFormat('sv-SE', { timeZone: tz });
      zone = tz;
    } catch {
      zone = undefined;
    }
  }
  resolvedZone = { tz, zone };
  return zone;
}

/**
 * 格式化時間戳記
 * 格式：YYYY-MM-DD HH:mm:ss
 */
function formatTimestamp(): string {
  return new Date().toLocaleString('sv-SE', {
    timeZone: resolveTimeZone(),
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  });
}

/**
 * Logger 類別
 */
export class Logger {
  private prefix: string;

  constructor(prefix: string) {
    this.prefix = prefix;
  }

  /**
   * 格式化訊息（含時間戳和前綴）
   */
  private format(message: string): string {
    return `[${formatTimestamp()}] [${this.prefix}] ${message}`;
  }

  /**
   * 一般資訊
   */
  info(message: string, ...args: unknown[]): void {
    console.log(this.format(message), ...args);
  }

  /**
   * 警告訊息
   */
  warn(message: string, ...args: unknown[]): void {
    console.warn(this.format(message), ...args);
  }

  /**
   * 錯誤訊息
   */
  error(message: string, ...args: unknown[]): void {
    console.error(this.format(message), ...args);
  }

  /**
   * Debug 訊息（僅在 DEBUG 環境變數啟用時輸出）
   */
  debug(message: string, ...args: unknown[]): void {
    if (process.env.DEBUG) {
      console.log(this.format(`[DEBUG] ${message}`), ...args);
    }
  }
}

/**
 * 元件依賴注入用的 Logger 介面
 */
export type LogSink = Pick<Logger, 'info' | 'warn' | 'error' | 'debug'>;

/**
 * 建立 Logger 實例
 */
export function createLogger(prefix: string): Logger {
  return new Logger(prefix);
}

export default Logger;
