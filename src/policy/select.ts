import { keysInOrder } from '../api/key-order.js';
import { isRecord } from '../api/types.js';
import type { Course } from '../state/types.js';
import type { CrimeOption, GymStat, InventoryItem, ItemCategory, Random } from './types.js';

// Crimes the API lists without a cost are priced out of reach of a normal nerve bar.
const DEFAULT_NERVE_COST = 100;

const ITEM_RULES: { match: string; category: ItemCategory }[] = [
  { match: 'energy drink', category: 'energy_drink' },
  { match: 'first aid', category: 'medical' },
  { match: 'morphine', category: 'medical' },
  { match: 'blood bag', category: 'medical' },
  { match: 'lollipop', category: 'candy' },
  { match: 'bon bon', category: 'candy' },
  { match: 'beer', category: 'alcohol' },
  { match: 'bottle of', category: 'alcohol' },
];

function toNumber(value: unknown, fallback: number): number {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) return Number(value);
  return fallback;
}

/**
 * Entries of an id-keyed mapping, in `order` when given, or of an array of
 * objects carrying their own id.
 */
function entriesOf(raw: unknown, order?: readonly string[]): [string, Record<string, unknown>][] {
  const entries: [string, Record<string, unknown>][] = [];
  if (Array.isArray(raw)) {
    raw.forEach((entry, index) => {
      if (!isRecord(entry)) return;
      const id = entry.ID ?? entry.id ?? index;
      entries.push([String(id), entry]);
    });
  } else if (isRecord(raw)) {
    for (const id of keysInOrder(raw, order)) {
      const entry = raw[id];
      if (isRecord(entry)) entries.push([id, entry]);
    }
  }
  return entries;
}

// --- Crimes ---

/** `order` is the mapping's key order as sent; see `readKeyOrder`. */
export function parseCrimes(raw: unknown, order?: readonly string[]): CrimeOption[] {
  return entriesOf(raw, order).map(([id, crime]) => ({
    id,
    name: typeof crime.name === 'string' ? crime.name : `Crime #${id}`,
    successProbability: toNumber(crime.success, 0),
    nerveCost: toNumber(crime.nerve, DEFAULT_NERVE_COST),
  }));
}

/**
 * Highest success probability among the crimes the current nerve can pay for.
 * Equal probabilities keep the earliest crime in `crimes`; a crime at 0 %
 * success is never picked.
 */
export function selectCrime(nerve: number, crimes: readonly CrimeOption[]): CrimeOption | null {
  if (nerve <= 0) return null;
  let best: CrimeOption | null = null;
  for (const crime of crimes) {
    if (crime.nerveCost > nerve) continue;
    if (crime.successProbability > (best?.successProbability ?? 0)) {
      best = crime;
    }
  }
  return best;
}

// --- Gym ---

export function selectGymStat(stats: readonly GymStat[], random: Random): GymStat | null {
  if (stats.length === 0) return null;
  const index = Math.min(stats.length - 1, Math.floor(random() * stats.length));
  return stats[index] ?? null;
}

// --- Items ---

export function categorizeItem(name: string): ItemCategory {
  const lower = name.toLowerCase();
  return ITEM_RULES.find(rule => lower.includes(rule.match))?.category ?? 'other';
}

export function parseInventory(raw: unknown): InventoryItem[] {
  return entriesOf(raw).map(([id, item]) => {
    const name = typeof item.name === 'string' ? item.name : '';
    return {
      id,
      name,
      category: categorizeItem(name),
      quantity: toNumber(item.quantity, 1),
    };
  });
}

export function selectItem(items: readonly InventoryItem[]): InventoryItem | null {
  return items.find(item => item.category === 'energy_drink') ?? null;
}

// --- Education ---

export function selectCourse(courses: readonly Course[]): Course | null {
  return courses.find(course => !course.completed) ?? null;
}
