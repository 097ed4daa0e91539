/**
 * 以 PowerShell 實作的 toast 平台
 *
 * Node 沒有 WinRT binding，每個平台步驟把對應的指令加進 Windows PowerShell
 * 腳本，透過 Windows.UI.Notifications 呼叫 WinRT。腳本只在 show() 時執行一次。
 * 每段指令先記錄步驟名稱，腳本層級的 trap 會把名稱寫到 stderr，
 * PowerShell 內的失敗仍能對應到出錯的步驟。
 */

import { spawn } from 'child_process';
import { writeFileSync, unlinkSync, existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { InitializationError, RenderError, TOAST_STEPS, errorMessage, type RenderStep } from '../errors.js';
import { createLogger } from '../../utils/logger.js';
import type {
  ToastContentHandle,
  ToastManagerHandle,
  ToastManagerInterface,
  ToastNotifierHandle,
  ToastPlatform,
  ToastSession,
  ToastTemplateType,
} from './platform.js';

const logger = createLogger('PowerShell');

/** Windows PowerShell 內建的 AppUserModelID，不需安裝 app 即可顯示 toast */
export const DEFAULT_APP_ID = '{1AC14E77-02E7-4E5D-B744-2EB1AE5198B7}\\WindowsPowerShell\\v1.0\\powershell.exe';

const SCRIPT_TIMEOUT_MS = 30000;

/**
 * PowerShell 腳本執行結果
 * @property success - exit code 為 0
 * @property output - 去除頭尾空白的 stdout
 * @property error - stderr，或 spawn 失敗的訊息
 */
export interface ScriptResult {
  success: boolean;
  output?: string;
  error?: string;
}

export type ScriptRunner = (scriptPath: string) => Promise<ScriptResult>;

export interface PowerShellToastPlatformOptions {
  executable?: string;
  /** 預設為 process.platform */
  platform?: NodeJS.Platform;
  /** 預設以 -File 啟動執行檔 */
  runScript?: ScriptRunner;
  /** 產生腳本的目錄，預設為 os.tmpdir() */
  scriptDir?: string;
}

/**
 * 轉成 PowerShell 單引號字串
 * PowerShell 也把彎引號視為引號字元
 */
export function quotePowerShell(value: string): string {
  return `'${value.replace(/['\u2018\u2019\u201A\u201B]/g, (quote) => quote + quote)}'`;
}

/**
 * 從失敗腳本的 stderr 取出步驟名稱
 */
export function parseFailedStep(stderr: string): RenderStep | null {
  const match = /^step=(\w+)/m.exec(stderr);
  if (!match) {
    return null;
  }
  const step = TOAST_STEPS.find((candidate) => candidate === match[1]);
  return step && step !== 'initialize' ? step : null;
}

/**
 * 移除 stderr 中的步驟標記行
 */
function failureDetail(stderr: string): string {
  return stderr
    .split(/\r?\n/)
    .filter((line) => line.trim() !== '' && !line.startsWith('step='))
    .join(' ')
    .trim();
}

export function runPowerShellScript(executable: string): ScriptRunner {
  return (scriptPath) => new Promise((resolve) => {
    const proc = spawn(
      executable,
      ['-NoProfile', '-NonInteractive', '-ExecutionPolicy', 'Bypass', '-File', scriptPath],
      { timeout: SCRIPT_TIMEOUT_MS, windowsHide: true }
    );

    let stdout = '';
    let stderr = '';

    proc.stdout.on('data', (data) => {
      stdout += data.toString();
    });

    proc.stderr.on('data', (data) => {
      stderr += data.toString();
    });

    proc.on('close', (code) => {
      if (code === 0) {
        resolve({ success: true, output: stdout.trim() });
      } else {
        resolve({
          success: false,
          error: stderr.trim() || stdout.trim() || `Exit code ${code}`,
        });
      }
    });

    proc.on('error', (err) => {
      resolve({ success: false, error: err.message });
    });
  });
}

/**
 * 累積 toast 腳本，指令只會依步驟順序加入
 */
export class ToastScript {
  private lines: string[] = [
    "$ErrorActionPreference = 'Stop'",
    "$step = 'initialize'",
    'trap {',
    '  [Console]::Error.WriteLine("step=$step")',
    '  [Console]::Error.WriteLine($_.Exception.Message)',
    '  exit 1',
    '}',
  ];

  addStep(step: RenderStep, statements: string[]): void {
    this.lines.push(`$step = ${quotePowerShell(step)}`, ...statements);
  }

  toString(): string {
    return this.lines.join('\r\n') + '\r\n';
  }
}

/**
 * 各步驟 handle 的基底類別
 * 釋放後再使用屬於呼叫端錯誤，回報為需要該 handle 的步驟失敗
 */
abstract class ScriptHandle {
  protected released = false;

  protected ensureLive(step: RenderStep): void {
    if (this.released) {
      throw new RenderError(step, `Handle used after release in step "${step}"`);
    }
  }

  release(): void {
    this.released = true;
  }
}

class ScriptContent extends ScriptHandle implements ToastContentHandle {
  constructor(private script: ToastScript) {
    super();
  }

  async setXml(xml: string): Promise<void> {
    this.ensureLive('content');
    this.script.addStep('content', [`$content.LoadXml(${quotePowerShell(xml)})`]);
  }

  isLive(): boolean {
    return !this.released;
  }
}

class ScriptNotifier extends ScriptHandle implements ToastNotifierHandle {
  constructor(private session: PowerShellToastSession) {
    super();
  }

  async show(content: ToastContentHandle): Promise<void> {
    this.ensureLive('show');
    if (!(content instanceof ScriptContent) || !content.isLive()) {
      throw new RenderError('show', 'Toast content was not created by this session');
    }
    await this.session.run();
  }
}

class ScriptManagerInterface extends ScriptHandle implements ToastManagerInterface {
  constructor(private session: PowerShellToastSession) {
    super();
  }

  async createNotifier(appId: string): Promise<ToastNotifierHandle> {
    this.ensureLive('notifier');
    if (!appId.trim()) {
      throw new RenderError('notifier', 'Toast app id is empty');
    }
    this.session.script.addStep('notifier', [
      `$notifier = [Windows.UI.Notifications.ToastNotificationManager]::CreateToastNotifier(${quotePowerShell(appId)})`,
    ]);
    return new ScriptNotifier(this.session);
  }

  async getTemplateContent(template: ToastTemplateType): Promise<ToastContentHandle> {
    this.ensureLive('template');
    this.session.script.addStep('template', [
      `$content = [Windows.UI.Notifications.ToastNotificationManager]::GetTemplateContent([Windows.UI.Notifications.ToastTemplateType]::${template})`,
    ]);
    return new ScriptContent(this.session.script);
  }
}

class ScriptManager extends ScriptHandle implements ToastManagerHandle {
  constructor(private session: PowerShellToastSession) {
    super();
  }

  async queryInterface(): Promise<ToastManagerInterface> {
    this.ensureLive('interface');
    this.session.script.addStep('interface', [
      '$null = [Windows.Data.Xml.Dom.XmlDocument, Windows.Data.Xml.Dom.XmlDocument, ContentType = WindowsRuntime]',
    ]);
    return new ScriptManagerInterface(this.session);
  }
}

export class PowerShellToastSession implements ToastSession {
  readonly script = new ToastScript();
  private scriptPath: string | null = null;

  constructor(
    private runScript: ScriptRunner,
    private scriptDir: string
  ) {}

  async getManager(): Promise<ToastManagerHandle> {
    this.script.addStep('manager', [
      '$null = [Windows.UI.Notifications.ToastNotificationManager, Windows.UI.Notifications, ContentType = WindowsRuntime]',
    ]);
    return new ScriptManager(this);
  }

  /**
   * 寫出累積的腳本並執行
   */
  async run(): Promise<void> {
    this.script.addStep('show', [
      '$notifier.Show([Windows.UI.Notifications.ToastNotification]::new($content))',
    ]);

    const scriptPath = join(this.scriptDir, `link-toast-${process.pid}-${Date.now()}.ps1`);
    try {
      // 沒有 BOM 時 Windows PowerShell 會以 ANSI 讀取
      writeFileSync(scriptPath, '\uFEFF' + this.script.toString(), 'utf-8');
    } catch (error) {
      throw new RenderError('show', `Failed to write toast script: ${errorMessage(error)}`, { cause: error });
    }
    this.scriptPath = scriptPath;
    logger.debug(`Running toast script ${scriptPath}`);

    const result = await this.runScript(scriptPath);
    if (!result.success) {
      const stderr = result.error ?? '';
      const step = parseFailedStep(stderr) ?? 'show';
      const detail = failureDetail(stderr) || 'PowerShell exited with an error';
      throw new RenderError(step, `Toast step "${step}" failed: ${detail}`);
    }
  }

  release(): void {
    if (this.scriptPath && existsSync(this.scriptPath)) {
      unlinkSync(this.scriptPath);
    }
    this.scriptPath = null;
  }
}

export class PowerShellToastPlatform implements ToastPlatform {
  readonly name = 'powershell';
  private platform: NodeJS.Platform;
  private runScript: ScriptRunner;
  private scriptDir: string;

  constructor(options: PowerShellToastPlatformOptions = {}) {
    this.platform = options.platform ?? process.platform;
    this.runScript = options.runScript ?? runPowerShellScript(options.executable || 'powershell.exe');
    this.scriptDir = options.scriptDir ?? tmpdir();
  }

  async initialize(): Promise<ToastSession> {
    if (this.platform !== 'win32') {
      throw new InitializationError(
        `Toast notifications need Windows (running on ${this.platform})`
      );
    }
    if (!existsSync(this.scriptDir)) {
      throw new InitializationError(`Script directory does not exist: ${this.scriptDir}`);
    }
    return new PowerShellToastSession(this.runScript, this.scriptDir);
  }
}
