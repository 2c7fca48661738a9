import { BAR_NAMES, OKAY_STATE } from './types.js';
import type { BarName, StatusSnapshot } from './types.js';

const RULE = '='.repeat(50);

const BAR_LABELS: Record<BarName, string> = {
  energy: 'Energy',
  nerve: 'Nerve',
  happy: 'Happy',
  life: 'Life',
};

export function formatDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  return `${Math.floor(seconds / 60)}m ${seconds % 60}s`;
}

export function formatTimestamp(ms: number): string {
  return new Date(ms).toISOString().replace('T', ' ').slice(0, 19);
}

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}

/** Human-readable status block, one string per line. */
export function formatSnapshot(snapshot: StatusSnapshot): string[] {
  const lines: string[] = [
    RULE,
    `Status update for ${snapshot.player.name} at ${formatTimestamp(snapshot.takenAt)}`,
    RULE,
  ];

  if (snapshot.status.state !== OKAY_STATE) {
    const detail = snapshot.status.description ? ` (${snapshot.status.description})` : '';
    lines.push(`Status: ${capitalize(snapshot.status.state)}${detail}`);
  }

  for (const name of BAR_NAMES) {
    const bar = snapshot.bars[name];
    if (bar) lines.push(`${BAR_LABELS[name]}: ${bar.current}/${bar.maximum}`);
  }

  for (const [name, seconds] of Object.entries(snapshot.cooldowns)) {
    if (seconds > 0) lines.push(`${capitalize(name)} cooldown: ${formatDuration(seconds)}`);
  }

  const pending = Object.entries(snapshot.notifications).filter(([, count]) => count > 0);
  if (pending.length > 0) {
    lines.push('', 'Notifications:');
    for (const [category, count] of pending) {
      lines.push(`  - ${category}: ${count}`);
    }
  }

  const current = snapshot.education?.current;
  if (current) {
    lines.push('', `Currently studying: ${current.name} - ${formatDuration(current.timeLeftSeconds)} remaining`);
  }

  lines.push(RULE);
  return lines;
}
