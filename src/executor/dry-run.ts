import type { ActionCategory } from '../policy/types.js';
import type { ActionExecutor } from './types.js';

const VERBS: Record<ActionCategory, string> = {
  crime: 'commit crime',
  gym: 'train',
  item: 'use item',
  education: 'start course',
};

/** API-only mode: reports what would happen without touching the game. */
export class DryRunExecutor implements ActionExecutor {
  readonly mode = 'dry-run' as const;
  readonly performed: { category: ActionCategory; targetId: string }[] = [];

  async login(): Promise<boolean> {
    console.log('[Executor] Dry run - no login needed');
    return true;
  }

  async perform(category: ActionCategory, targetId: string): Promise<boolean> {
    this.performed.push({ category, targetId });
    console.log(`[Executor] Dry run: would ${VERBS[category]} ${targetId} (needs browser mode to act)`);
    return true;
  }

  async close(): Promise<void> {
    // nothing held
  }
}
