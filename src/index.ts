import 'dotenv/config';
import { validateEnv, loadConfig } from './config.js';
import type { BotConfig } from './config.js';
import { TornApiClient } from './api/client.js';
import { describeApiError } from './api/types.js';
import { StartupError } from './errors.js';
import { BrowserExecutor } from './executor/browser.js';
import { DryRunExecutor } from './executor/dry-run.js';
import type { ActionExecutor } from './executor/types.js';
import { createSeededRandom, mathRandom } from './policy/random.js';
import { Scheduler } from './scheduler/scheduler.js';

function createExecutor(config: Readonly<BotConfig>): ActionExecutor {
  if (config.mode === 'browser') {
    return new BrowserExecutor({
      username: config.username,
      password: config.password,
      headless: config.headless,
    });
  }
  return new DryRunExecutor();
}

async function fetchProfile(client: TornApiClient): Promise<{ id: number | null; name: string }> {
  const result = await client.user(['profile']);
  if (!result.ok) {
    throw new StartupError(`Failed to fetch profile (${describeApiError(result.error)}). Check your API key.`);
  }
  const { player_id: id, name } = result.data;
  return {
    id: typeof id === 'number' ? id : null,
    name: typeof name === 'string' ? name : 'Unknown',
  };
}

function logConfig(config: Readonly<BotConfig>): void {
  const f = config.features;
  console.log('[Init] Features enabled:');
  console.log(`  - Crimes: ${f.crimes}`);
  console.log(`  - Gym: ${f.gym} (${config.gymStats.join(', ')})`);
  console.log(`  - Items: ${f.items}`);
  console.log(`  - Education: ${f.education}`);
  console.log(`  - Travel: ${f.travel}${f.travel ? ' (no travel actions are selected yet)' : ''}`);
  console.log(`[Init] Executor: ${config.mode}${config.mode === 'browser' ? ` (${config.headless ? 'headless' : 'visible'})` : ''}`);
  console.log(`[Init] API spacing ${config.minRequestIntervalMs / 1000}s, poll every ${config.pollIntervalMs / 1000}s`);
}

async function main(): Promise<number> {
  console.log(`
  ==========================================
           TORN AUTOPILOT v1.0
    Crimes, gym, items and courses on a timer
  ==========================================
  `);

  validateEnv();
  const config = loadConfig();

  const client = new TornApiClient({
    apiKey: config.apiKey,
    minIntervalMs: config.minRequestIntervalMs,
  });

  console.log('[Init] Fetching player profile...');
  const profile = await fetchProfile(client);
  console.log(`[Init] Running for: ${profile.name} [${profile.id ?? '?'}]`);
  logConfig(config);

  const executor = createExecutor(config);
  const scheduler = new Scheduler({
    client,
    executor,
    features: config.features,
    gymStats: config.gymStats,
    pollIntervalMs: config.pollIntervalMs,
    random: config.randomSeed === null ? mathRandom : createSeededRandom(config.randomSeed),
  });

  const controller = new AbortController();
  const stop = (signal: string) => {
    if (controller.signal.aborted) return;
    console.log(`\n[Shutdown] ${signal} received - finishing up`);
    controller.abort();
  };
  process.on('SIGINT', () => stop('SIGINT'));
  process.on('SIGTERM', () => stop('SIGTERM'));

  console.log('[Running] Press Ctrl+C to stop.');
  const reason = await scheduler.run(controller.signal);
  return reason === 'fatal' ? 1 : 0;
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    const msg = error instanceof Error ? error.message : String(error);
    console.error(`[FATAL] ${msg}`);
    process.exitCode = 1;
  });
