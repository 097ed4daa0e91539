import { errorMessage } from './errors.js';
import type { Update } from './telegram-schema.js';
import type { NotificationRequest } from './toast/toast-xml.js';
import { extractURL } from './url-extractor.js';
import type { LogSink } from '../utils/logger.js';

export const NOTIFICATION_TITLE = 'New Message';

export interface LinkCheckDeps {
  fetchUpdates: () => Promise<Update[]>;
  showNotification: (request: NotificationRequest) => Promise<void>;
  logger: LogSink;
}

export type LinkCheckOutcome =
  | { status: 'fetch-failed'; error: unknown }
  | { status: 'no-updates' }
  | { status: 'no-message'; updateId: number }
  | { status: 'no-url'; updateId: number }
  | { status: 'notify-failed'; updateId: number; error: unknown }
  | { status: 'notified'; updateId: number; request: NotificationRequest };

export function buildNotificationRequest(text: string, url: string): NotificationRequest {
  return {
    title: NOTIFICATION_TITLE,
    body: `You received a new message: ${text}`,
    url,
  };
}

/**
 * API 應依舊到新的順序回傳更新
 */
function isAscending(updates: Update[]): boolean {
  return updates.every((update, i) => i === 0 || updates[i - 1].updateId < update.updateId);
}

/**
 * 取得待處理的更新，並為最新一則訊息中的連結顯示 toast
 * 「最新」指位置上的最後一筆更新
 */
export async function checkLatestMessage(deps: LinkCheckDeps): Promise<LinkCheckOutcome> {
  const { logger } = deps;

  let updates: Update[];
  try {
    updates = await deps.fetchUpdates();
  } catch (error) {
    logger.error(`Error fetching updates: ${errorMessage(error)}`);
    return { status: 'fetch-failed', error };
  }

  const lastUpdate = updates.at(-1);
  if (!lastUpdate) {
    logger.info('No new messages.');
    return { status: 'no-updates' };
  }

  logger.debug(`Fetched ${updates.length} update(s), last update_id ${lastUpdate.updateId}`);
  if (!isAscending(updates)) {
    logger.warn('Updates are not in ascending update_id order; using the last one anyway');
  }

  const message = lastUpdate.message;
  if (!message) {
    logger.info('No message in the last update.');
    return { status: 'no-message', updateId: lastUpdate.updateId };
  }

  const url = extractURL(message);
  if (!url) {
    logger.info('No URL found in the last message.');
    return { status: 'no-url', updateId: lastUpdate.updateId };
  }

  const request = buildNotificationRequest(message.text, url);
  try {
    await deps.showNotification(request);
  } catch (error) {
    logger.error(`Error showing notification: ${errorMessage(error)}`);
    return { status: 'notify-failed', updateId: lastUpdate.updateId, error };
  }

  logger.info(`Notification shown for update ${lastUpdate.updateId}`);
  return { status: 'notified', updateId: lastUpdate.updateId, request };
}

export function exitCodeFor(outcome: LinkCheckOutcome): number {
  switch (outcome.status) {
    case 'fetch-failed':
    case 'notify-failed':
      return 1;
    case 'no-updates':
    case 'no-message':
    case 'no-url':
    case 'notified':
      return 0;
  }
}
