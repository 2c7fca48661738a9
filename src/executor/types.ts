import type { ActionCategory } from '../policy/types.js';

export type ExecutorMode = 'dry-run' | 'browser';

/**
 * Performs decided actions in the game. `false` means the game (or the page)
 * turned the action down; callers log it and move on.
 */
export interface ActionExecutor {
  readonly mode: ExecutorMode;
  login(): Promise<boolean>;
  perform(category: ActionCategory, targetId: string): Promise<boolean>;
  /** Releases whatever the executor holds. Safe to call more than once. */
  close(): Promise<void>;
}
