import type { ApiError } from '../api/types.js';
import type { Course } from '../state/types.js';

// --- Action policy types ---

export type ActionCategory = 'crime' | 'gym' | 'item' | 'education';

export const GYM_STATS = ['strength', 'defense', 'speed', 'dexterity'] as const;
export type GymStat = (typeof GYM_STATS)[number];

export interface FeatureFlags {
  readonly crimes: boolean;
  readonly gym: boolean;
  readonly items: boolean;
  readonly education: boolean;
  /** Recorded and reported; no travel selector exists. */
  readonly travel: boolean;
}

export interface ActionDecision {
  readonly category: ActionCategory;
  readonly targetId: string;
  readonly rationale: string;
}

export interface CrimeOption {
  readonly id: string;
  readonly name: string;
  /** 0-100 */
  readonly successProbability: number;
  readonly nerveCost: number;
}

export type ItemCategory = 'energy_drink' | 'medical' | 'candy' | 'alcohol' | 'other';

export interface InventoryItem {
  readonly id: string;
  readonly name: string;
  readonly category: ItemCategory;
  readonly quantity: number;
}

/** Returns a float in [0, 1). */
export type Random = () => number;

export type CategoryOutcome =
  | { status: 'decided'; decision: ActionDecision }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; error: ApiError };

export interface PolicyOutcome {
  /** Set when the player status blocked every category. */
  blockedBy: string | null;
  outcomes: Partial<Record<ActionCategory, CategoryOutcome>>;
  decisions: ActionDecision[];
}

/** Detail data fetched during one cycle, shared between categories. */
export interface CycleCache {
  courses?: readonly Course[];
}
