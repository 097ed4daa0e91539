import { InitializationError, RenderError, errorMessage, type RenderStep } from '../errors.js';
import { createLogger, type LogSink } from '../../utils/logger.js';
import type { ToastPlatform, ToastSession } from './platform.js';
import { DEFAULT_APP_ID, PowerShellToastPlatform } from './powershell-platform.js';
import { ResourceScope } from './resource-scope.js';
import { buildToastXml, type NotificationRequest } from './toast-xml.js';

const defaultLogger = createLogger('Toast');

export interface ToastNotifierOptions {
  platform?: ToastPlatform;
  appId?: string;
  logger?: LogSink;
}

/**
 * 執行單一平台步驟，失敗時包成該步驟的 RenderError
 */
async function runStep<T>(step: RenderStep, action: () => Promise<T>): Promise<T> {
  try {
    return await action();
  } catch (error) {
    if (error instanceof RenderError) {
      throw error;
    }
    throw new RenderError(step, `Toast step "${step}" failed: ${errorMessage(error)}`, { cause: error });
  }
}

export class ToastNotifier {
  private platform: ToastPlatform;
  private appId: string;
  private logger: LogSink;

  constructor(options: ToastNotifierOptions = {}) {
    this.platform = options.platform ?? new PowerShellToastPlatform();
    this.appId = options.appId || DEFAULT_APP_ID;
    this.logger = options.logger ?? defaultLogger;
  }

  private async initialize(): Promise<ToastSession> {
    try {
      return await this.platform.initialize();
    } catch (error) {
      if (error instanceof InitializationError) {
        throw error;
      }
      throw new InitializationError(
        `Failed to initialize ${this.platform.name} notifications: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * 顯示一則 toast（每次呼叫都會顯示新的一則）
   * 過程中取得的 handle 會在回傳或拋出錯誤前全部釋放
   */
  async show(request: NotificationRequest): Promise<void> {
    const xml = buildToastXml(request);
    const scope = new ResourceScope(this.logger);

    try {
      const session = scope.adopt(await this.initialize());
      const manager = scope.adopt(await runStep('manager', () => session.getManager()));
      const managerInterface = scope.adopt(await runStep('interface', () => manager.queryInterface()));
      const notifier = scope.adopt(await runStep('notifier', () => managerInterface.createNotifier(this.appId)));
      const content = scope.adopt(await runStep('template', () => managerInterface.getTemplateContent('ToastText02')));

      await runStep('content', () => content.setXml(xml));
      await runStep('show', () => notifier.show(content));
      this.logger.debug(`Toast shown via ${this.platform.name}`);
    } finally {
      await scope.release();
    }
  }
}

/**
 * ToastNotifier.show 的單次呼叫版本
 */
export async function showNotification(
  title: string,
  body: string,
  url: string,
  options?: ToastNotifierOptions
): Promise<void> {
  await new ToastNotifier(options).show({ title, body, url });
}
