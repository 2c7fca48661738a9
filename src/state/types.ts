// --- Player status snapshot ---

export type BarName = 'energy' | 'nerve' | 'happy' | 'life';

export const BAR_NAMES: readonly BarName[] = ['energy', 'nerve', 'happy', 'life'];

export interface Bar {
  readonly current: number;
  readonly maximum: number;
}

export type Bars = Readonly<Partial<Record<BarName, Bar>>>;

export interface PlayerStatus {
  readonly state: string;
  readonly description: string;
}

export interface CurrentCourse {
  readonly name: string;
  readonly timeLeftSeconds: number;
}

export interface Course {
  readonly id: string;
  readonly name: string;
  readonly completed: boolean;
}

export interface EducationState {
  /** Course in progress, or null when not studying. */
  readonly current: CurrentCourse | null;
  /** Available courses in response order, or null when the payload carried none. */
  readonly courses: readonly Course[] | null;
}

export interface StatusSnapshot {
  readonly takenAt: number;
  readonly player: { readonly id: number | null; readonly name: string };
  readonly status: PlayerStatus;
  readonly bars: Bars;
  readonly cooldowns: Readonly<Record<string, number>>;
  readonly notifications: Readonly<Record<string, number>>;
  /** Only present when the education feature is enabled. */
  readonly education?: EducationState;
}

export const OKAY_STATE = 'okay';
