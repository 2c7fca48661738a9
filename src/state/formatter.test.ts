import { describe, it, expect } from 'vitest';
import { formatDuration, formatSnapshot, formatTimestamp } from './formatter.js';
import type { StatusSnapshot } from './types.js';

const RULE = '='.repeat(50);

function makeSnapshot(overrides: Partial<StatusSnapshot> = {}): StatusSnapshot {
  return {
    takenAt: Date.UTC(2024, 4, 17, 9, 5, 30),
    player: { id: 1001, name: 'Tester' },
    status: { state: 'okay', description: 'Okay' },
    bars: {
      energy: { current: 50, maximum: 150 },
      nerve: { current: 25, maximum: 60 },
    },
    cooldowns: {},
    notifications: {},
    ...overrides,
  };
}

describe('formatDuration', () => {
  it('renders minutes and seconds', () => {
    expect(formatDuration(0)).toBe('0m 0s');
    expect(formatDuration(125)).toBe('2m 5s');
    expect(formatDuration(3725)).toBe('62m 5s');
  });

  it('clamps negatives to zero', () => {
    expect(formatDuration(-10)).toBe('0m 0s');
  });
});

describe('formatTimestamp', () => {
  it('renders UTC date and time', () => {
    expect(formatTimestamp(Date.UTC(2024, 4, 17, 9, 5, 30))).toBe('2024-05-17 09:05:30');
  });
});

describe('formatSnapshot', () => {
  it('renders header and present bars only', () => {
    expect(formatSnapshot(makeSnapshot())).toEqual([
      RULE,
      'Status update for Tester at 2024-05-17 09:05:30',
      RULE,
      'Energy: 50/150',
      'Nerve: 25/60',
      RULE,
    ]);
  });

  it('skips inactive cooldowns and zero notifications', () => {
    const lines = formatSnapshot(makeSnapshot({
      bars: {},
      cooldowns: { drug: 0, medical: 125, booster: -5 },
      notifications: { messages: 0, events: 3 },
    }));
    expect(lines).toEqual([
      RULE,
      'Status update for Tester at 2024-05-17 09:05:30',
      RULE,
      'Medical cooldown: 2m 5s',
      '',
      'Notifications:',
      '  - events: 3',
      RULE,
    ]);
  });

  it('shows the blocking status and the course in progress', () => {
    const lines = formatSnapshot(makeSnapshot({
      bars: {},
      status: { state: 'hospital', description: 'In hospital for 12 mins' },
      education: { current: { name: 'Intro to Law', timeLeftSeconds: 600 }, courses: null },
    }));
    expect(lines).toEqual([
      RULE,
      'Status update for Tester at 2024-05-17 09:05:30',
      RULE,
      'Status: Hospital (In hospital for 12 mins)',
      '',
      'Currently studying: Intro to Law - 10m 0s remaining',
      RULE,
    ]);
  });
});
