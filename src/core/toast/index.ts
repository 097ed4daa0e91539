export { ToastNotifier, showNotification, type ToastNotifierOptions } from './notifier.js';
export {
  PowerShellToastPlatform,
  DEFAULT_APP_ID,
  type PowerShellToastPlatformOptions,
  type ScriptRunner,
  type ScriptResult,
} from './powershell-platform.js';
export { ResourceScope } from './resource-scope.js';
export { buildToastXml, type NotificationRequest } from './toast-xml.js';
export type {
  PlatformHandle,
  ToastPlatform,
  ToastSession,
  ToastManagerHandle,
  ToastManagerInterface,
  ToastNotifierHandle,
  ToastContentHandle,
  ToastTemplateType,
} from './platform.js';
