import type { TornApiClient } from '../api/client.js';
import { keysInOrder } from '../api/key-order.js';
import type { KeyOrder } from '../api/key-order.js';
import { isRecord } from '../api/types.js';
import type { ApiPayload, ApiResult } from '../api/types.js';
import type { FeatureFlags } from '../policy/types.js';
import { BAR_NAMES, OKAY_STATE } from './types.js';
import type { Bar, Bars, BarName, Course, CurrentCourse, EducationState, PlayerStatus, StatusSnapshot } from './types.js';

const BASE_FIELDS = ['profile', 'bars', 'cooldowns', 'notifications'] as const;

/** Field set for the per-cycle status request. */
export function snapshotFields(features: FeatureFlags): string[] {
  const fields: string[] = [...BASE_FIELDS];
  if (features.education) fields.push('education');
  return fields;
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function parseBar(raw: unknown): Bar | undefined {
  if (!isRecord(raw)) return undefined;
  const current = toNumber(raw.current);
  const maximum = toNumber(raw.maximum);
  if (current === null || maximum === null) return undefined;
  return { current, maximum };
}

function parseBars(raw: ApiPayload): Bars {
  // The bars selection puts each bar at the top level; some payloads nest them.
  const source = isRecord(raw.bars) ? raw.bars : raw;
  const bars: Partial<Record<BarName, Bar>> = {};
  for (const name of BAR_NAMES) {
    const bar = parseBar(source[name]);
    if (bar) bars[name] = bar;
  }
  return bars;
}

function parseCounts(raw: unknown): Record<string, number> {
  const counts: Record<string, number> = {};
  if (!isRecord(raw)) return counts;
  for (const [key, value] of Object.entries(raw)) {
    const n = toNumber(value);
    if (n !== null) counts[key] = n;
  }
  return counts;
}

function parseStatus(raw: unknown): PlayerStatus {
  if (!isRecord(raw) || typeof raw.state !== 'string') {
    return { state: OKAY_STATE, description: '' };
  }
  return {
    state: raw.state.toLowerCase(),
    description: typeof raw.description === 'string' ? raw.description : '',
  };
}

/** Course mapping (id -> { name, completed }) in `order`, the key order as sent. */
export function parseCourses(raw: unknown, order?: readonly string[]): Course[] | null {
  if (!isRecord(raw)) return null;
  const courses: Course[] = [];
  for (const id of keysInOrder(raw, order)) {
    const course = raw[id];
    if (!isRecord(course)) continue;
    const completed = course.completed === true || (toNumber(course.completed) ?? 0) > 0;
    courses.push({
      id,
      name: typeof course.name === 'string' ? course.name : 'Unknown',
      completed,
    });
  }
  return courses;
}

function parseCurrentCourse(raw: ApiPayload): CurrentCourse | null {
  const current = raw.education_current;
  if (isRecord(current)) {
    if (Object.keys(current).length === 0) return null;
    return {
      name: typeof current.name === 'string' ? current.name : 'Unknown',
      timeLeftSeconds: toNumber(current.time_left) ?? 0,
    };
  }
  const courseId = toNumber(current);
  if (courseId !== null && courseId > 0) {
    return {
      name: `Course #${courseId}`,
      timeLeftSeconds: toNumber(raw.education_timeleft) ?? 0,
    };
  }
  return null;
}

function parseEducation(raw: ApiPayload, keyOrder?: KeyOrder): EducationState {
  return {
    current: parseCurrentCourse(raw),
    courses: parseCourses(raw.education, keyOrder?.get('education')),
  };
}

export function parseSnapshot(
  raw: ApiPayload,
  features: FeatureFlags,
  takenAt: number,
  keyOrder?: KeyOrder
): StatusSnapshot {
  const snapshot: StatusSnapshot = {
    takenAt,
    player: {
      id: toNumber(raw.player_id),
      name: typeof raw.name === 'string' ? raw.name : 'Unknown',
    },
    status: parseStatus(raw.status),
    bars: parseBars(raw),
    cooldowns: parseCounts(raw.cooldowns),
    notifications: parseCounts(raw.notifications),
  };
  if (!features.education) return snapshot;
  return { ...snapshot, education: parseEducation(raw, keyOrder) };
}

/**
 * One batched status request. Errors come back as-is so the caller can keep
 * whatever snapshot it already had.
 */
export async function buildSnapshot(
  client: TornApiClient,
  features: FeatureFlags,
  signal?: AbortSignal,
  now: () => number = Date.now
): Promise<ApiResult<StatusSnapshot>> {
  const result = await client.user(snapshotFields(features), undefined, signal);
  if (!result.ok) return result;
  return { ok: true, data: parseSnapshot(result.data, features, now(), result.keyOrder) };
}
