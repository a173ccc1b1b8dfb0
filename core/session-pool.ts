/**
 * 会话池
 * 负责唯一浏览器进程的懒启动、复用和关闭
 */

import { addExtra } from 'puppeteer-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import puppeteerCore, { type Browser, type PuppeteerLaunchOptions } from 'puppeteer-core';
import { BROWSER_ARGS, IGNORED_DEFAULT_ARGS, SANDBOX_ARGS } from '../config/constants';
import { createEnhancedLogger, toError } from '../utils/logger';
import { retryWithBackoff } from '../utils/retry';
import { SessionInitError } from './errors';

const puppeteer = addExtra(puppeteerCore);
puppeteer.use(StealthPlugin());

const logger = createEnhancedLogger('SessionPool');

export type SessionState = 'uninitialized' | 'ready' | 'closed';

export interface Session {
  browser: Browser;
  launchArgs: string[];
  launchedAt: Date;
  version: string;
}

export type BrowserLauncher = (options: PuppeteerLaunchOptions) => Promise<Browser>;

export interface SessionPoolOptions {
  headless?: boolean;
  noSandbox?: boolean;
  executablePath?: string;
  extraArgs?: string[];
  launcher?: BrowserLauncher;
  /** 启动失败后的重试次数 */
  launchRetries?: number;
  launchRetryDelayMs?: number;
}

export interface SessionPoolStatus {
  state: SessionState;
  launchArgs: string[];
  launchedAt?: Date;
  version?: string;
}

const defaultLauncher: BrowserLauncher = async (options) => {
  const browser: Browser = await puppeteer.launch(options);
  return browser;
};

/**
 * 构建启动参数
 */
export function buildLaunchArgs(options: Pick<SessionPoolOptions, 'noSandbox' | 'extraArgs'>): string[] {
  const args: string[] = [...BROWSER_ARGS];
  if (options.noSandbox !== false) {
    args.unshift(...SANDBOX_ARGS);
  }
  if (options.extraArgs) {
    args.push(...options.extraArgs);
  }
  return args;
}

export class SessionPool {
  private session: Session | null = null;
  private state: SessionState = 'uninitialized';
  private initializing: Promise<Session> | null = null;
  private readonly options: SessionPoolOptions;
  private readonly launcher: BrowserLauncher;

  constructor(options: SessionPoolOptions = {}) {
    this.options = options;
    this.launcher = options.launcher ?? defaultLauncher;
  }

  /**
   * 获取会话；未就绪时启动，并发调用共享同一次启动
   */
  async acquireSession(): Promise<Session> {
    if (this.session && this.state === 'ready') {
      if (this.session.browser.connected) {
        return this.session;
      }
      logger.warn('Browser disconnected, re-initializing session');
      this.session = null;
      this.state = 'closed';
    }

    if (!this.initializing) {
      this.initializing = this.initialize().finally(() => {
        this.initializing = null;
      });
    }
    return this.initializing;
  }

  private async initialize(): Promise<Session> {
    const launchArgs = buildLaunchArgs(this.options);
    const executablePath =
      this.options.executablePath || process.env.PUPPETEER_EXECUTABLE_PATH || process.env.CHROME_BIN;

    const launchOptions: PuppeteerLaunchOptions = {
      headless: this.options.headless !== false,
      args: launchArgs,
      ignoreDefaultArgs: [...IGNORED_DEFAULT_ARGS],
      defaultViewport: null,
    };

    if (executablePath) {
      launchOptions.executablePath = executablePath;
      logger.info(`Using Chrome at: ${executablePath}`);
    } else {
      launchOptions.channel = 'chrome';
    }

    let browser: Browser;
    try {
      browser = await retryWithBackoff(() => this.launcher(launchOptions), {
        maxRetries: this.options.launchRetries ?? 1,
        baseDelay: this.options.launchRetryDelayMs ?? 1000,
        backoff: 'linear',
        onRetry: (error, attempt, delay) => {
          logger.warn(`Browser launch failed, retry ${attempt} in ${delay}ms`, {
            error: toError(error).message,
          });
        },
      });
    } catch (error) {
      logger.error('Failed to launch browser', toError(error));
      throw new SessionInitError('Failed to launch browser', toError(error));
    }

    // 启动后探测一次，失败则关掉进程再抛出
    let version: string;
    try {
      version = await browser.version();
    } catch (error) {
      logger.error('Browser readiness probe failed', toError(error));
      await this.safeClose(browser);
      throw new SessionInitError('Browser launched but is not responding', toError(error));
    }

    const session: Session = { browser, launchArgs, launchedAt: new Date(), version };
    this.session = session;
    this.state = 'ready';
    logger.info('Browser session ready', { version, headless: launchOptions.headless });
    return session;
  }

  private async safeClose(browser: Browser): Promise<void> {
    try {
      await browser.close();
    } catch (closeError) {
      const message = toError(closeError).message;
      logger.warn(`Browser close failed: ${message}`);

      // 正常关闭失败时强制终止进程
      const browserProcess = browser.process();
      if (browserProcess?.pid) {
        try {
          process.kill(browserProcess.pid, 'SIGKILL');
        } catch (killError) {
          logger.warn(`Failed to kill browser process: ${toError(killError).message}`);
        }
      }
    }
  }

  /**
   * 关闭会话，下次 acquireSession 会重新启动
   */
  async close(): Promise<void> {
    const pending = this.initializing;
    if (pending) {
      // 等待进行中的启动结束再关闭
      await pending.catch((error: unknown) => {
        logger.debug('Pending launch failed before close', { error: toError(error).message });
      });
    }

    const session = this.session;
    this.session = null;
    this.state = session ? 'closed' : this.state;
    if (session) {
      await this.safeClose(session.browser);
      logger.info('Browser session closed');
    }
  }

  getState(): SessionState {
    return this.state;
  }

  getStatus(): SessionPoolStatus {
    return {
      state: this.state,
      launchArgs: this.session?.launchArgs ?? buildLaunchArgs(this.options),
      launchedAt: this.session?.launchedAt,
      version: this.session?.version,
    };
  }
}

let globalPool: SessionPool | null = null;

/**
 * 进程级共享的会话池
 */
export function getSessionPool(options?: SessionPoolOptions): SessionPool {
  if (!globalPool) {
    globalPool = new SessionPool(options);
  }
  return globalPool;
}

export async function resetSessionPool(): Promise<void> {
  const pool = globalPool;
  globalPool = null;
  if (pool) {
    await pool.close();
  }
}
