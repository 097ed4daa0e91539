/**
 * 原生 toast API 介面
 *
 * 對應 Windows 通知子系統的呼叫順序：初始化子系統、取得 manager、
 * XML 文件介面、app id 的 notifier、範本內容，載入 toast XML 後顯示。
 * 不論顯示成功或失敗，每個 handle 都必須釋放。
 */

export interface PlatformHandle {
  release(): void | Promise<void>;
}

export type ToastTemplateType = 'ToastText02';

export interface ToastContentHandle extends PlatformHandle {
  setXml(xml: string): Promise<void>;
}

export interface ToastNotifierHandle extends PlatformHandle {
  show(content: ToastContentHandle): Promise<void>;
}

export interface ToastManagerInterface extends PlatformHandle {
  createNotifier(appId: string): Promise<ToastNotifierHandle>;
  getTemplateContent(template: ToastTemplateType): Promise<ToastContentHandle>;
}

export interface ToastManagerHandle extends PlatformHandle {
  queryInterface(): Promise<ToastManagerInterface>;
}

/**
 * 已初始化的子系統；釋放時一併關閉
 */
export interface ToastSession extends PlatformHandle {
  getManager(): Promise<ToastManagerHandle>;
}

export interface ToastPlatform {
  readonly name: string;
  initialize(): Promise<ToastSession>;
}
