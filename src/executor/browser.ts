import { chromium } from 'playwright-core';
import { StartupError, UnrecoverableError } from '../errors.js';
import type { ActionCategory } from '../policy/types.js';
import type { ActionExecutor } from './types.js';

export const TORN_WEB_BASE = 'https://www.torn.com';

const PAGE_TIMEOUT_MS = 10_000;
const POPUP_SETTLE_MS = 2_000;
const MAX_POPUPS = 5;
const SAFE_TARGET = /^[\w-]+$/;

/** The slice of a Playwright page the executor drives. */
export interface PageDriver {
  goto(url: string): Promise<unknown>;
  fill(selector: string, value: string): Promise<void>;
  click(selector: string): Promise<void>;
  waitForSelector(selector: string, options?: { timeout?: number }): Promise<unknown>;
  textContent(selector: string): Promise<string | null>;
  isVisible(selector: string): Promise<boolean>;
  waitForTimeout(ms: number): Promise<void>;
}

export interface BrowserHandle {
  newPage(): Promise<PageDriver>;
  close(): Promise<void>;
}

export type BrowserLauncher = (headless: boolean) => Promise<BrowserHandle>;

export const launchChromium: BrowserLauncher = async headless => {
  const browser = await chromium.launch({
    headless,
    args: [
      '--disable-gpu',
      '--no-sandbox',
      '--disable-dev-shm-usage',
      '--disable-extensions',
      '--disable-notifications',
      '--disable-infobars',
    ],
  });
  return {
    newPage: () => browser.newPage({ viewport: { width: 1366, height: 768 } }),
    close: () => browser.close(),
  };
};

interface PageAction {
  label: string;
  path: string;
  target: (id: string) => string;
  submit: string;
  /** Substring of the result message that means it worked. */
  success: string;
  /** Present on the page when the action cannot start. */
  busy?: { selector: string; message: string };
}

const PAGE_ACTIONS: Record<ActionCategory, PageAction> = {
  crime: {
    label: 'Committing crime',
    path: '/crimes.php',
    target: id => `#crime${id}`,
    submit: '.submit-crime',
    success: 'success',
  },
  gym: {
    label: 'Training',
    path: '/gym.php',
    target: stat => `#train-${stat}`,
    submit: '.train-submit',
    success: 'trained',
  },
  item: {
    label: 'Using item',
    path: '/item.php',
    target: id => `#item${id}`,
    submit: '.use-item',
    success: 'used',
  },
  education: {
    label: 'Starting course',
    path: '/education.php',
    target: id => `#course${id}`,
    submit: '.start-education',
    success: 'started',
    busy: { selector: '.education-active', message: 'Already studying a course' },
  },
};

export interface BrowserExecutorOptions {
  username: string;
  password: string;
  headless: boolean;
  baseUrl?: string;
  launch?: BrowserLauncher;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Drives the game's web pages through a Chromium instance started on first use. */
export class BrowserExecutor implements ActionExecutor {
  readonly mode = 'browser' as const;

  private readonly username: string;
  private readonly password: string;
  private readonly headless: boolean;
  private readonly baseUrl: string;
  private readonly launch: BrowserLauncher;

  private browser: BrowserHandle | null = null;
  private page: PageDriver | null = null;
  private loggedIn = false;

  constructor(options: BrowserExecutorOptions) {
    if (!options.username || !options.password) {
      throw new StartupError('Username and password are required for browser mode');
    }
    this.username = options.username;
    this.password = options.password;
    this.headless = options.headless;
    this.baseUrl = options.baseUrl ?? TORN_WEB_BASE;
    this.launch = options.launch ?? launchChromium;
  }

  get isLoggedIn(): boolean {
    return this.loggedIn;
  }

  private async ensurePage(): Promise<PageDriver> {
    if (this.page) return this.page;
    console.log(`[Browser] Launching Chromium (${this.headless ? 'headless' : 'visible'})...`);
    try {
      this.browser = await this.launch(this.headless);
      this.page = await this.browser.newPage();
    } catch (error) {
      throw new UnrecoverableError(`Failed to launch browser: ${errorMessage(error)}`, error);
    }
    return this.page;
  }

  async login(): Promise<boolean> {
    if (this.loggedIn) return true;
    const page = await this.ensurePage();

    try {
      console.log('[Browser] Logging in...');
      await page.goto(`${this.baseUrl}/login`);
      await page.waitForSelector('#player', { timeout: PAGE_TIMEOUT_MS });
      await page.fill('#player', this.username);
      await page.fill('#password', this.password);
      await page.click("input[type='submit']");
      await page.waitForSelector('.user-info', { timeout: PAGE_TIMEOUT_MS });
    } catch (error) {
      console.warn(`[Browser] Login failed: ${errorMessage(error)}`);
      return false;
    }

    this.loggedIn = true;
    console.log('[Browser] Login successful');
    await this.dismissPopups(page);
    return true;
  }

  private async dismissPopups(page: PageDriver): Promise<void> {
    try {
      await page.waitForTimeout(POPUP_SETTLE_MS);
      for (let i = 0; i < MAX_POPUPS && await page.isVisible('.popup-info .close-icon'); i++) {
        await page.click('.popup-info .close-icon');
        await page.waitForTimeout(500);
      }
    } catch (error) {
      console.warn(`[Browser] Error handling popups: ${errorMessage(error)}`);
    }
  }

  async perform(category: ActionCategory, targetId: string): Promise<boolean> {
    const action = PAGE_ACTIONS[category];
    if (!SAFE_TARGET.test(targetId)) {
      console.warn(`[Browser] Refusing unexpected ${category} target "${targetId}"`);
      return false;
    }
    if (!this.loggedIn && !(await this.login())) return false;
    const page = await this.ensurePage();

    try {
      console.log(`[Browser] ${action.label} ${targetId}...`);
      await page.goto(`${this.baseUrl}${action.path}`);
      await page.waitForSelector('.content-title', { timeout: PAGE_TIMEOUT_MS });

      if (action.busy && await page.isVisible(action.busy.selector)) {
        console.log(`[Browser] ${action.busy.message}`);
        return false;
      }

      await page.click(action.target(targetId));
      await page.waitForSelector(action.submit, { timeout: PAGE_TIMEOUT_MS });
      await page.click(action.submit);
      await page.waitForSelector('.msg', { timeout: PAGE_TIMEOUT_MS });

      const text = (await page.textContent('.msg'))?.trim() ?? '';
      if (text.toLowerCase().includes(action.success)) {
        console.log(`[Browser] ${action.label} ${targetId}: ${text}`);
        return true;
      }
      console.warn(`[Browser] ${action.label} ${targetId} rejected: ${text || 'no message'}`);
      return false;
    } catch (error) {
      console.warn(`[Browser] ${action.label} ${targetId} failed: ${errorMessage(error)}`);
      return false;
    }
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    this.page = null;
    this.loggedIn = false;
    if (!browser) return;
    try {
      console.log('[Browser] Closing browser...');
      await browser.close();
      console.log('[Browser] Browser closed');
    } catch (error) {
      console.warn(`[Browser] Error closing browser: ${errorMessage(error)}`);
    }
  }
}
