import { encode } from 'html-entities';

export interface NotificationRequest {
  title: string;
  body: string;
  url: string;
}

export const ACTION_LABEL = 'Open browser';

function escapeXml(value: string): string {
  return encode(value, { mode: 'specialChars', level: 'xml' });
}

/**
 * 兩行文字加上一個按鈕，點擊後把 URL 交給預設的 protocol handler
 * （http/https 即為瀏覽器）
 */
export function buildToastXml(request: NotificationRequest): string {
  return [
    '<toast>',
    '  <visual>',
    '    <binding template="ToastGeneric">',
    `      <text>${escapeXml(request.title)}</text>`,
    `      <text>${escapeXml(request.body)}</text>`,
    '    </binding>',
    '  </visual>',
    '  <actions>',
    `    <action content="${ACTION_LABEL}" arguments="${escapeXml(request.url)}" activationType="protocol"/>`,
    '  </actions>',
    '</toast>',
  ].join('\n');
}
