import { errorMessage } from '../errors.js';
import type { LogSink } from '../../utils/logger.js';
import type { PlatformHandle } from './platform.js';

/**
 * 收集已取得的平台 handle，由新到舊釋放
 * release() 用在 `finally` 區塊：釋放失敗的 handle 只記錄 log，其餘照常釋放
 */
export class ResourceScope {
  private handles: PlatformHandle[] = [];

  constructor(private logger: LogSink) {}

  adopt<T extends PlatformHandle>(handle: T): T {
    this.handles.push(handle);
    return handle;
  }

  async release(): Promise<void> {
    const handles = this.handles.splice(0).reverse();
    for (const handle of handles) {
      try {
        await handle.release();
      } catch (error) {
        this.logger.warn(`Failed to release platform handle: ${errorMessage(error)}`);
      }
    }
  }
}
