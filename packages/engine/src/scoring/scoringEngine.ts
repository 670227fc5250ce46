import { DEFAULT_CONFIG } from '../config.js';
import { HitGrade, labelResult, MatchOutcome, Pattern, PatternAction, ReferenceResult, ResultLabel } from '../model.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('scoring');

export interface ScoringOptions {
  /** Points removed from the 0..100 score per extra candidate. */
  penaltyPerExtra?: number;
}

export interface ActionFeedback {
  action: PatternAction;
  result: ReferenceResult;
  label: ResultLabel;
}

export interface ScoreReport {
  /** Percentage of reference actions hit, minus the extra penalty, in 0..100. */
  totalScore: number;
  hits: number;
  misses: number;
  extras: number;
  /** Hits with a negative delta. */
  early: number;
  /** Hits with a positive delta. */
  late: number;
  /** Accumulated grade points (perfect 100, good 75, ok 25). */
  points: number;
  /** Longest run of consecutive hits in reference order. */
  maxCombo: number;
  /** Mean |delta| over hits, or null without hits. */
  meanAbsDeltaMs: number | null;
  perAction: readonly ActionFeedback[];
  warnings: readonly string[];
}

export const GRADE_POINTS: Readonly<Record<HitGrade, number>> = { perfect: 100, good: 75, ok: 25 };

export const EMPTY_PATTERN_WARNING = 'EmptyPatternWarning: pattern has no actions; score is 0';

/**
 * Aggregate match results into a report. Pure: the same pattern and
 * outcome always give an equal report.
 */
export function score(pattern: Pattern, outcome: MatchOutcome, opts: ScoringOptions = {}): ScoreReport {
  const n = pattern.actions.length;
  if (outcome.references.length !== n) {
    throw new Error(`Outcome has ${outcome.references.length} results for a pattern of ${n} actions`);
  }
  const penalty = opts.penaltyPerExtra ?? DEFAULT_CONFIG.penaltyPerExtra;

  let hits = 0;
  let early = 0;
  let late = 0;
  let points = 0;
  let combo = 0;
  let maxCombo = 0;
  let absDeltaSum = 0;
  const perAction: ActionFeedback[] = [];

  outcome.references.forEach((result, i) => {
    perAction.push({ action: pattern.actions[i], result, label: labelResult(result) });
    if (result.kind === 'miss') {
      combo = 0;
      return;
    }
    hits++;
    if (result.deltaMs < 0) early++;
    else if (result.deltaMs > 0) late++;
    points += GRADE_POINTS[result.grade];
    absDeltaSum += Math.abs(result.deltaMs);
    combo++;
    maxCombo = Math.max(maxCombo, combo);
  });

  const extras = outcome.candidates.filter(c => c.kind === 'extra').length;
  const warnings: string[] = [];
  if (n === 0) {
    warnings.push(EMPTY_PATTERN_WARNING);
    log.warn(EMPTY_PATTERN_WARNING);
  }

  const raw = (100 * hits) / Math.max(1, n) - penalty * extras;

  return {
    totalScore: Math.min(100, Math.max(0, raw)),
    hits,
    misses: n - hits,
    extras,
    early,
    late,
    points,
    maxCombo,
    meanAbsDeltaMs: hits > 0 ? Math.round((absDeltaSum / hits) * 1000) / 1000 : null,
    perAction,
    warnings,
  };
}

export default score;
