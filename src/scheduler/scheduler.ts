import type { TornApiClient } from '../api/client.js';
import { describeApiError } from '../api/types.js';
import type { ApiError } from '../api/types.js';
import { systemClock, type Clock } from '../clock.js';
import { UnrecoverableError } from '../errors.js';
import type { ActionExecutor } from '../executor/types.js';
import { decideActions } from '../policy/engine.js';
import { mathRandom } from '../policy/random.js';
import type { ActionDecision, FeatureFlags, GymStat, PolicyOutcome, Random } from '../policy/types.js';
import { formatSnapshot } from '../state/formatter.js';
import { buildSnapshot } from '../state/snapshot.js';
import type { StatusSnapshot } from '../state/types.js';

export type SchedulerState = 'idle' | 'executing' | 'stopped';

export type StopReason = 'cancelled' | 'fatal';

export interface SchedulerOptions {
  client: TornApiClient;
  executor: ActionExecutor;
  features: FeatureFlags;
  gymStats: readonly GymStat[];
  pollIntervalMs: number;
  random?: Random;
  clock?: Clock;
}

export interface ActionAttempt {
  decision: ActionDecision;
  success: boolean;
  error?: string;
}

export interface CycleReport {
  cycle: number;
  startedAt: number;
  durationMs: number;
  snapshotError: ApiError | null;
  policy: PolicyOutcome | null;
  attempts: ActionAttempt[];
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Poll -> decide -> execute, one cycle at a time, on a fixed rate.
 *
 * A cycle that runs past its slot starts the next one straight away; missed
 * slots are not replayed.
 */
export class Scheduler {
  private readonly client: TornApiClient;
  private readonly executor: ActionExecutor;
  private readonly features: FeatureFlags;
  private readonly gymStats: readonly GymStat[];
  private readonly pollIntervalMs: number;
  private readonly random: Random;
  private readonly clock: Clock;

  private _state: SchedulerState = 'idle';
  private _lastSnapshot: StatusSnapshot | null = null;
  private authenticated = false;
  private cycleCount = 0;

  constructor(options: SchedulerOptions) {
    this.client = options.client;
    this.executor = options.executor;
    this.features = options.features;
    this.gymStats = options.gymStats;
    this.pollIntervalMs = options.pollIntervalMs;
    this.random = options.random ?? mathRandom;
    this.clock = options.clock ?? systemClock;
  }

  get state(): SchedulerState {
    return this._state;
  }

  /** Most recent snapshot that was built successfully. */
  get lastSnapshot(): StatusSnapshot | null {
    return this._lastSnapshot;
  }

  async run(signal: AbortSignal): Promise<StopReason> {
    console.log(`[Scheduler] Polling every ${this.pollIntervalMs / 1000}s`);
    let reason: StopReason = 'cancelled';

    try {
      while (!signal.aborted) {
        const startedAt = this.clock.now();
        try {
          await this.runCycle(signal);
        } catch (error) {
          if (error instanceof UnrecoverableError) {
            console.error(`[FATAL] ${error.message}`);
            reason = 'fatal';
            break;
          }
          console.error('[Scheduler] Cycle failed:', error);
          // Don't crash - try again next cycle
        }
        if (signal.aborted) break;

        const wait = Math.max(0, startedAt + this.pollIntervalMs - this.clock.now());
        if (wait > 0) await this.clock.sleep(wait, signal);
      }
    } finally {
      this._state = 'stopped';
      await this.releaseExecutor();
    }

    console.log(`[Scheduler] Stopped (${reason})`);
    return reason;
  }

  async runCycle(signal?: AbortSignal): Promise<CycleReport> {
    if (this._state === 'executing') throw new Error('A cycle is already running');
    if (this._state === 'stopped') throw new Error('Scheduler is stopped');

    this._state = 'executing';
    try {
      return await this.executeCycle(signal);
    } finally {
      if (this._state === 'executing') this._state = 'idle';
    }
  }

  private async executeCycle(signal?: AbortSignal): Promise<CycleReport> {
    const startedAt = this.clock.now();
    const cycle = ++this.cycleCount;
    const report: CycleReport = { cycle, startedAt, durationMs: 0, snapshotError: null, policy: null, attempts: [] };

    console.log(`\n[${new Date(startedAt).toISOString()}] Cycle #${cycle} starting...`);

    const built = await buildSnapshot(this.client, this.features, signal, () => this.clock.now());
    if (!built.ok) {
      console.warn(`[Status] Failed to update status (${describeApiError(built.error)}) - skipping actions this cycle`);
      report.snapshotError = built.error;
      report.durationMs = this.clock.now() - startedAt;
      return report;
    }

    this._lastSnapshot = built.data;
    for (const line of formatSnapshot(built.data)) console.log(line);

    report.policy = await decideActions(built.data, {
      client: this.client,
      features: this.features,
      gymStats: this.gymStats,
      random: this.random,
      signal,
    });
    report.attempts = await this.execute(report.policy.decisions, signal);
    report.durationMs = this.clock.now() - startedAt;

    const succeeded = report.attempts.filter(a => a.success).length;
    console.log(`[Scheduler] Cycle #${cycle} done: ${report.policy.decisions.length} decisions, ${succeeded}/${report.attempts.length} actions succeeded`);
    return report;
  }

  private async execute(decisions: ActionDecision[], signal?: AbortSignal): Promise<ActionAttempt[]> {
    const attempts: ActionAttempt[] = [];
    let loginFailed = false;

    for (const decision of decisions) {
      if (signal?.aborted) break;
      const label = `${decision.category} ${decision.targetId}`;

      if (loginFailed || !(await this.ensureLoggedIn())) {
        loginFailed = true;
        console.warn(`[Executor] Skipping ${label}: executor not logged in`);
        attempts.push({ decision, success: false, error: 'login failed' });
        continue;
      }

      try {
        const success = await this.executor.perform(decision.category, decision.targetId);
        if (!success) console.warn(`[Executor] ${label} failed`);
        attempts.push({ decision, success });
      } catch (error) {
        if (error instanceof UnrecoverableError) throw error;
        console.warn(`[Executor] ${label} errored: ${errorMessage(error)}`);
        attempts.push({ decision, success: false, error: errorMessage(error) });
      }
    }

    return attempts;
  }

  private async ensureLoggedIn(): Promise<boolean> {
    if (this.authenticated) return true;
    try {
      this.authenticated = await this.executor.login();
    } catch (error) {
      if (error instanceof UnrecoverableError) throw error;
      console.warn(`[Executor] Login errored: ${errorMessage(error)}`);
      return false;
    }
    if (!this.authenticated) console.warn('[Executor] Login failed - will retry next cycle');
    return this.authenticated;
  }

  private async releaseExecutor(): Promise<void> {
    try {
      await this.executor.close();
    } catch (error) {
      console.warn(`[Executor] Failed to release executor: ${errorMessage(error)}`);
    }
  }
}
