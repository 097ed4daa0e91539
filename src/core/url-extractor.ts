import type { Message } from './telegram-schema.js';

/**
 * 取出第一個 `url` entity 的連結，沒有時回傳空字串
 * 連結原樣回傳，不做 URL 驗證
 */
export function extractURL(message: Message): string {
  for (const entity of message.entities) {
    if (entity.kind === 'url') {
      return entity.url;
    }
  }
  return '';
}
