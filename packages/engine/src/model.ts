/**
 * Shared data model: input events, recordings, patterns and match results.
 *
 * All times are logical seconds on the unified playback timeline.
 */

export type LogicalTime = number;

export type KeyAction = 'press' | 'release';

export function isKeyAction(value: unknown): value is KeyAction {
  return value === 'press' || value === 'release';
}

export interface InputEvent {
  time: LogicalTime;
  key: string;
  action: KeyAction;
}

/** An event as handed over by the input source, before time mapping. */
export interface RawInputEvent {
  key: string;
  action: KeyAction;
  /** Wall-clock seconds on the input device's clock. */
  wallTime: number;
}

export type AnomalyKind = 'orphan-release' | 'repeat-press';

export interface OrphanReleaseAnomaly {
  kind: 'orphan-release';
  key: string;
  time: LogicalTime;
}

export interface RepeatPressAnomaly {
  kind: 'repeat-press';
  key: string;
  time: LogicalTime;
}

export type Anomaly = OrphanReleaseAnomaly | RepeatPressAnomaly;

export interface Recording {
  readonly sourceId: string;
  readonly totalDuration: LogicalTime;
  /** ISO-8601 timestamp. */
  readonly createdAt: string;
  readonly events: readonly InputEvent[];
  readonly anomalies: readonly Anomaly[];
}

export interface PatternAction extends InputEvent {
  /** Overrides the pattern's default tolerance window for this action. */
  toleranceMs?: number;
}

export interface Pattern {
  readonly name: string;
  readonly sourceId: string;
  readonly totalDuration: LogicalTime;
  readonly createdAt: string;
  readonly defaultToleranceMs: number;
  readonly actions: readonly PatternAction[];
}

export type HitGrade = 'perfect' | 'good' | 'ok';

export interface HitResult {
  kind: 'hit';
  /** candidate.time - reference.time in ms; negative means early. */
  deltaMs: number;
  /** Index of the matched candidate in arrival order. */
  candidate: number;
  grade: HitGrade;
}

export interface MissResult {
  kind: 'miss';
}

export type ReferenceResult = HitResult | MissResult;

export type CandidateResult =
  | { kind: 'matched'; reference: number }
  | { kind: 'extra' };

export interface MatchOutcome {
  readonly references: readonly ReferenceResult[];
  readonly candidates: readonly CandidateResult[];
}

export type ResultLabel = 'hit' | 'too-early' | 'too-late' | 'miss';

/**
 * Display label for a reference result. Matched results graded `ok` are
 * shown as too early or too late by the sign of their delta; they still
 * count as hits for scoring.
 */
export function labelResult(result: ReferenceResult): ResultLabel {
  if (result.kind === 'miss') return 'miss';
  if (result.grade !== 'ok') return 'hit';
  if (result.deltaMs < 0) return 'too-early';
  if (result.deltaMs > 0) return 'too-late';
  return 'hit';
}

export function toleranceOf(pattern: Pattern, action: PatternAction): number {
  return action.toleranceMs ?? pattern.defaultToleranceMs;
}

/** Freeze a recording or pattern together with its nested records. */
export function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
