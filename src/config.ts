import 'dotenv/config';
import type { FeatureFlags } from './policy/types.js';
import { GYM_STATS, type GymStat } from './policy/types.js';

export type BotMode = 'dry-run' | 'browser';

export interface BotConfig {
  apiKey: string;
  mode: BotMode;
  minRequestIntervalMs: number;
  pollIntervalMs: number;
  features: FeatureFlags;
  gymStats: readonly GymStat[];
  headless: boolean;
  randomSeed: number | null;
  username: string;
  password: string;
}

type Env = Record<string, string | undefined>;

const TRUTHY = new Set(['true', '1', 't', 'yes', 'y']);

export function parseBool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return TRUTHY.has(value.trim().toLowerCase());
}

function parseSeconds(value: string | undefined, fallback: number): number {
  const n = Number(value);
  if (!value || !Number.isFinite(n) || n < 0) return fallback;
  return n;
}

function parseMode(value: string | undefined): BotMode {
  return value?.trim().toLowerCase() === 'browser' ? 'browser' : 'dry-run';
}

function parseGymStats(value: string | undefined): GymStat[] {
  if (!value) return [...GYM_STATS];
  const wanted = value.split(',').map(s => s.trim().toLowerCase());
  const picked = GYM_STATS.filter(stat => wanted.includes(stat));
  return picked.length > 0 ? picked : [...GYM_STATS];
}

function parseSeed(value: string | undefined): number | null {
  if (!value || value.trim() === '') return null;
  const n = Number.parseInt(value, 10);
  return Number.isFinite(n) ? n : null;
}

/** Names of required variables that are missing from `env`. */
export function findMissingEnv(env: Env = process.env): string[] {
  const required = ['TORN_API_KEY'];
  if (parseMode(env.BOT_MODE) === 'browser') {
    required.push('TORN_USERNAME', 'TORN_PASSWORD');
  }
  return required.filter(key => !env[key]);
}

export function validateEnv(env: Env = process.env): void {
  const missing = findMissingEnv(env);

  if (missing.length > 0) {
    console.error(`Missing environment variables: ${missing.join(', ')}`);
    console.error('Create a .env file with these values. See .env.example');
    process.exit(1);
  }
}

export function loadConfig(env: Env = process.env): Readonly<BotConfig> {
  return Object.freeze({
    apiKey: env.TORN_API_KEY ?? '',
    mode: parseMode(env.BOT_MODE),
    minRequestIntervalMs: parseSeconds(env.API_CALL_INTERVAL, 30) * 1000,
    pollIntervalMs: parseSeconds(env.POLL_INTERVAL, 60) * 1000,
    features: Object.freeze({
      crimes: parseBool(env.ENABLE_CRIMES, true),
      gym: parseBool(env.ENABLE_GYM, true),
      items: parseBool(env.ENABLE_ITEMS, true),
      education: parseBool(env.ENABLE_EDUCATION, true),
      travel: parseBool(env.ENABLE_TRAVEL, false),
    }),
    gymStats: Object.freeze(parseGymStats(env.GYM_STATS)),
    headless: parseBool(env.HEADLESS_BROWSER, false),
    randomSeed: parseSeed(env.RANDOM_SEED),
    username: env.TORN_USERNAME ?? '',
    password: env.TORN_PASSWORD ?? '',
  });
}
