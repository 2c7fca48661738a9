import { describe, it, expect, vi } from 'vitest';
import { BrowserExecutor } from './browser.js';
import type { BrowserHandle, PageDriver } from './browser.js';
import { DryRunExecutor } from './dry-run.js';
import { StartupError, UnrecoverableError } from '../errors.js';
import type { ActionCategory } from '../policy/types.js';

// ─── Fake page ──────────────────────────────────────────────────────────────

interface FakePageOptions {
  message?: string;
  visible?: string[];
  missing?: string[];
}

function fakePage(options: FakePageOptions = {}) {
  const steps: string[] = [];
  const visible = new Set(options.visible ?? []);
  const missing = new Set(options.missing ?? []);

  const page: PageDriver = {
    goto: async url => { steps.push(`goto ${url}`); },
    fill: async (selector, value) => { steps.push(`fill ${selector}=${value}`); },
    click: async selector => {
      steps.push(`click ${selector}`);
      visible.delete(selector);
    },
    waitForSelector: async selector => {
      if (missing.has(selector)) throw new Error(`Timeout waiting for ${selector}`);
    },
    textContent: async () => options.message ?? null,
    isVisible: async selector => visible.has(selector),
    waitForTimeout: async () => {},
  };
  return { page, steps };
}

function makeExecutor(page: PageDriver) {
  const close = vi.fn(async () => {});
  const browser: BrowserHandle = { newPage: async () => page, close };
  const launch = vi.fn(async () => browser);
  const executor = new BrowserExecutor({
    username: 'tester',
    password: 'test-password',
    headless: true,
    baseUrl: 'https://game.test',
    launch,
  });
  return { executor, launch, close };
}

// ─── Construction ───────────────────────────────────────────────────────────

describe('BrowserExecutor construction', () => {
  it('requires login details', () => {
    expect(() => new BrowserExecutor({ username: '', password: 'x', headless: true })).toThrow(StartupError);
  });

  it('does not launch a browser until needed', () => {
    const { launch } = makeExecutor(fakePage().page);
    expect(launch).not.toHaveBeenCalled();
  });
});

// ─── login ──────────────────────────────────────────────────────────────────

describe('login', () => {
  it('fills the form and dismisses popups once', async () => {
    const { page, steps } = fakePage({ visible: ['.popup-info .close-icon'] });
    const { executor, launch } = makeExecutor(page);

    expect(await executor.login()).toBe(true);
    expect(await executor.login()).toBe(true);

    expect(launch).toHaveBeenCalledTimes(1);
    expect(launch).toHaveBeenCalledWith(true);
    expect(steps).toEqual([
      'goto https://game.test/login',
      'fill #player=tester',
      'fill #password=test-password',
      "click input[type='submit']",
      'click .popup-info .close-icon',
    ]);
    expect(executor.isLoggedIn).toBe(true);
  });

  it('returns false when the page never confirms the login', async () => {
    const { page } = fakePage({ missing: ['.user-info'] });
    const { executor } = makeExecutor(page);
    expect(await executor.login()).toBe(false);
    expect(executor.isLoggedIn).toBe(false);
  });

  it('throws an unrecoverable error when the browser cannot start', async () => {
    const executor = new BrowserExecutor({
      username: 'tester',
      password: 'test-password',
      headless: true,
      launch: async () => { throw new Error("Executable doesn't exist"); },
    });
    await expect(executor.login()).rejects.toThrow(UnrecoverableError);
  });
});

// ─── perform ────────────────────────────────────────────────────────────────

type PageCase = [category: ActionCategory, target: string, message: string, path: string, targetSelector: string, submit: string];

const PAGE_CASES: PageCase[] = [
  ['gym', 'speed', 'You trained speed 10 times', '/gym.php', '#train-speed', '.train-submit'],
  ['item', '5', 'You used an Energy Drink', '/item.php', '#item5', '.use-item'],
  ['education', '2', 'You started the course', '/education.php', '#course2', '.start-education'],
];

describe('perform', () => {
  it('logs in first, then commits a crime and reads the result', async () => {
    const { page, steps } = fakePage({ message: 'Success! You found $120.' });
    const { executor } = makeExecutor(page);

    expect(await executor.perform('crime', '3')).toBe(true);
    expect(steps.slice(-4)).toEqual([
      "click input[type='submit']",
      'goto https://game.test/crimes.php',
      'click #crime3',
      'click .submit-crime',
    ]);
  });

  it.each(PAGE_CASES)('performs %s %s', async (category, target, message, path, targetSelector, submit) => {
    const { page, steps } = fakePage({ message });
    const { executor } = makeExecutor(page);
    await executor.login();
    steps.length = 0;

    expect(await executor.perform(category, target)).toBe(true);
    expect(steps).toEqual([`goto https://game.test${path}`, `click ${targetSelector}`, `click ${submit}`]);
  });

  it('returns false when the game turns the action down', async () => {
    const { page } = fakePage({ message: 'You do not have enough nerve' });
    const { executor } = makeExecutor(page);
    expect(await executor.perform('crime', '3')).toBe(false);
  });

  it('returns false when a page element never shows up', async () => {
    const { page } = fakePage({ missing: ['.train-submit'] });
    const { executor } = makeExecutor(page);
    expect(await executor.perform('gym', 'strength')).toBe(false);
  });

  it('does not start a course while one is active', async () => {
    const { page, steps } = fakePage({ visible: ['.education-active'], message: 'started' });
    const { executor } = makeExecutor(page);
    expect(await executor.perform('education', '2')).toBe(false);
    expect(steps).not.toContain('click #course2');
  });

  it('refuses targets that are not plain ids', async () => {
    const { page, steps } = fakePage({ message: 'used' });
    const { executor, launch } = makeExecutor(page);
    expect(await executor.perform('item', '5, #logout')).toBe(false);
    expect(steps).toEqual([]);
    expect(launch).not.toHaveBeenCalled();
  });

  it('returns false without acting when login fails', async () => {
    const { page, steps } = fakePage({ missing: ['.user-info'] });
    const { executor } = makeExecutor(page);
    expect(await executor.perform('crime', '1')).toBe(false);
    expect(steps).not.toContain('goto https://game.test/crimes.php');
  });
});

// ─── close ──────────────────────────────────────────────────────────────────

describe('close', () => {
  it('releases the browser once', async () => {
    const { page } = fakePage();
    const { executor, close } = makeExecutor(page);
    await executor.login();
    await executor.close();
    await executor.close();
    expect(close).toHaveBeenCalledTimes(1);
    expect(executor.isLoggedIn).toBe(false);
  });

  it('is a no-op before launch', async () => {
    const { executor, close } = makeExecutor(fakePage().page);
    await executor.close();
    expect(close).not.toHaveBeenCalled();
  });
});

// ─── DryRunExecutor ─────────────────────────────────────────────────────────

describe('DryRunExecutor', () => {
  it('records actions and reports success', async () => {
    const executor = new DryRunExecutor();
    expect(await executor.login()).toBe(true);
    expect(await executor.perform('gym', 'strength')).toBe(true);
    expect(executor.performed).toEqual([{ category: 'gym', targetId: 'strength' }]);
    await executor.close();
  });
});
