/**
 * 單次執行指令
 *
 * 載入設定、檢查一次最新的 Telegram 訊息，並回傳 process exit code。
 * 由工作排程器或 cron 啟動。
 */

import { loadConfig, type AppConfig } from '../core/config.js';
import { isLinkToastError } from '../core/errors.js';
import { checkLatestMessage, exitCodeFor } from '../core/link-check.js';
import { TelegramClient } from '../core/telegram-client.js';
import { ToastNotifier } from '../core/toast/notifier.js';
import { PowerShellToastPlatform } from '../core/toast/powershell-platform.js';
import type { ToastPlatform } from '../core/toast/platform.js';
import { createLogger, type LogSink } from '../utils/logger.js';
import { VERSION } from '../version.js';

export interface RunOverrides {
  platform?: ToastPlatform;
  logger?: LogSink;
}

export async function run(
  env: NodeJS.ProcessEnv = process.env,
  overrides: RunOverrides = {}
): Promise<number> {
  const logger = overrides.logger ?? createLogger('LinkToast');
  logger.debug(`link-toast v${VERSION}`);

  let appConfig: AppConfig;
  try {
    appConfig = loadConfig(env);
  } catch (error) {
    if (!isLinkToastError(error)) {
      throw error;
    }
    logger.error(error.message);
    return 1;
  }

  const client = new TelegramClient({
    token: appConfig.telegramToken,
    apiUrl: appConfig.telegramApiUrl,
    timeout: appConfig.requestTimeoutMs,
  });
  const notifier = new ToastNotifier({
    platform: overrides.platform ?? new PowerShellToastPlatform({ executable: appConfig.powershellPath }),
    appId: appConfig.toastAppId,
  });

  const outcome = await checkLatestMessage({
    fetchUpdates: () => client.fetchUpdates(),
    showNotification: (request) => notifier.show(request),
    logger,
  });
  return exitCodeFor(outcome);
}
