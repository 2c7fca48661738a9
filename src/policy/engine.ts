import type { TornApiClient } from '../api/client.js';
import { describeApiError } from '../api/types.js';
import { parseCourses } from '../state/snapshot.js';
import { OKAY_STATE } from '../state/types.js';
import type { StatusSnapshot } from '../state/types.js';
import { parseCrimes, parseInventory, selectCourse, selectCrime, selectGymStat, selectItem } from './select.js';
import type {
  ActionCategory,
  ActionDecision,
  CategoryOutcome,
  CycleCache,
  FeatureFlags,
  GymStat,
  PolicyOutcome,
  Random,
} from './types.js';

export interface PolicyContext {
  client: TornApiClient;
  features: FeatureFlags;
  gymStats: readonly GymStat[];
  random: Random;
  signal?: AbortSignal;
}

interface CategoryPolicy {
  category: ActionCategory;
  tag: string;
  enabled: (features: FeatureFlags) => boolean;
  evaluate: (snapshot: StatusSnapshot, ctx: PolicyContext, cache: CycleCache) => Promise<CategoryOutcome>;
}

const skipped = (reason: string): CategoryOutcome => ({ status: 'skipped', reason });
const decided = (decision: ActionDecision): CategoryOutcome => ({ status: 'decided', decision });

// --- Category policies ---

const crimePolicy: CategoryPolicy = {
  category: 'crime',
  tag: 'Crime',
  enabled: f => f.crimes,
  async evaluate(snapshot, ctx) {
    const nerve = snapshot.bars.nerve?.current ?? 0;
    if (nerve <= 0) return skipped('Not enough nerve to commit crimes');

    const result = await ctx.client.user(['crimes'], undefined, ctx.signal);
    if (!result.ok) return { status: 'failed', error: result.error };

    const crime = selectCrime(nerve, parseCrimes(result.data.crimes, result.keyOrder?.get('crimes')));
    if (!crime) return skipped('No suitable crimes found');
    return decided({
      category: 'crime',
      targetId: crime.id,
      rationale: `${crime.name} (success ${crime.successProbability}%, costs ${crime.nerveCost}/${nerve} nerve)`,
    });
  },
};

const gymPolicy: CategoryPolicy = {
  category: 'gym',
  tag: 'Gym',
  enabled: f => f.gym,
  async evaluate(snapshot, ctx) {
    const energy = snapshot.bars.energy?.current ?? 0;
    if (energy <= 0) return skipped('Not enough energy to train at the gym');

    const result = await ctx.client.user(['gyms'], undefined, ctx.signal);
    if (!result.ok) return { status: 'failed', error: result.error };

    const stat = selectGymStat(ctx.gymStats, ctx.random);
    if (!stat) return skipped('No gym stats configured');
    return decided({
      category: 'gym',
      targetId: stat,
      rationale: `training ${stat} with ${energy} energy`,
    });
  },
};

const itemPolicy: CategoryPolicy = {
  category: 'item',
  tag: 'Items',
  enabled: f => f.items,
  async evaluate(_snapshot, ctx) {
    const result = await ctx.client.user(['inventory'], undefined, ctx.signal);
    if (!result.ok) return { status: 'failed', error: result.error };

    const items = parseInventory(result.data.inventory);
    const item = selectItem(items);
    if (!item) return skipped('No usable items found in inventory');
    const drinks = items.filter(i => i.category === 'energy_drink').length;
    return decided({
      category: 'item',
      targetId: item.id,
      rationale: `${item.name} (${drinks} energy drink${drinks === 1 ? '' : 's'} in inventory)`,
    });
  },
};

const educationPolicy: CategoryPolicy = {
  category: 'education',
  tag: 'Education',
  enabled: f => f.education,
  async evaluate(snapshot, ctx, cache) {
    if (snapshot.education?.current) return skipped('Already studying a course');

    let courses = cache.courses ?? snapshot.education?.courses ?? undefined;
    if (!courses) {
      const result = await ctx.client.user(['education'], undefined, ctx.signal);
      if (!result.ok) return { status: 'failed', error: result.error };
      courses = parseCourses(result.data.education, result.keyOrder?.get('education')) ?? [];
    }
    cache.courses = courses;

    const course = selectCourse(courses);
    if (!course) return skipped('No suitable education courses found');
    return decided({
      category: 'education',
      targetId: course.id,
      rationale: `starting ${course.name}`,
    });
  },
};

export const CATEGORY_POLICIES: readonly CategoryPolicy[] = [crimePolicy, gymPolicy, itemPolicy, educationPolicy];

function logOutcome(tag: string, outcome: CategoryOutcome): void {
  switch (outcome.status) {
    case 'decided':
      console.log(`[${tag}] Selected ${outcome.decision.targetId}: ${outcome.decision.rationale}`);
      break;
    case 'skipped':
      console.log(`[${tag}] ${outcome.reason}`);
      break;
    case 'failed':
      console.warn(`[${tag}] Detail fetch failed, skipping this cycle: ${describeApiError(outcome.error)}`);
      break;
  }
}

/**
 * Turns one snapshot into at most one decision per enabled category.
 * Categories run in a fixed order and never affect each other.
 */
export async function decideActions(snapshot: StatusSnapshot, ctx: PolicyContext): Promise<PolicyOutcome> {
  if (snapshot.status.state !== OKAY_STATE) {
    console.log(`[Policy] Cannot perform actions. Current state: ${snapshot.status.state}`);
    return { blockedBy: snapshot.status.state, outcomes: {}, decisions: [] };
  }

  const cache: CycleCache = {};
  const outcomes: PolicyOutcome['outcomes'] = {};
  const decisions: ActionDecision[] = [];

  for (const policy of CATEGORY_POLICIES) {
    if (!policy.enabled(ctx.features)) continue;
    if (ctx.signal?.aborted) break;
    const outcome = await policy.evaluate(snapshot, ctx, cache);
    outcomes[policy.category] = outcome;
    logOutcome(policy.tag, outcome);
    if (outcome.status === 'decided') decisions.push(outcome.decision);
  }

  return { blockedBy: null, outcomes, decisions };
}
