import { DEFAULT_CONFIG, GradeRatios, KeyRepeatPolicy } from '../config.js';
import {
  CandidateResult,
  deepFreeze,
  HitGrade,
  InputEvent,
  LogicalTime,
  MatchOutcome,
  Pattern,
  PatternAction,
  ReferenceResult,
  toleranceOf,
} from '../model.js';
import { normalizeKey } from '../recorder/keys.js';
import { createLogger } from '../util/logger.js';
import { deltaMs } from '../util/time.js';

const log = createLogger('matching');

export interface MatchingOptions {
  keyRepeatPolicy?: KeyRepeatPolicy;
  gradeRatios?: GradeRatios;
}

/** Live classification emitted as references close and candidates arrive. */
export type MatchFeedback =
  | { kind: 'hit'; reference: number; candidate: number; action: PatternAction; event: InputEvent; deltaMs: number; grade: HitGrade }
  | { kind: 'miss'; reference: number; action: PatternAction }
  | { kind: 'extra'; candidate: number; event: InputEvent };

// Open references of one (action, key) pair, in time order. Entries that
// are no longer pending are skipped lazily from the head.
interface OpenQueue {
  refs: number[];
  head: number;
}

function queueKey(action: string, key: string): string {
  return `${action}\u0000${normalizeKey(key)}`;
}

export function gradeHit(absDeltaMs: number, toleranceMs: number, ratios: GradeRatios): HitGrade {
  const ratio = toleranceMs > 0 ? absDeltaMs / toleranceMs : 0;
  if (ratio <= ratios.perfect) return 'perfect';
  if (ratio <= ratios.good) return 'good';
  return 'ok';
}

/**
 * Incremental matcher of a candidate stream against a reference pattern.
 *
 * Each candidate is committed on arrival: it is compared only with the
 * earliest still-open reference of the same key and action, and becomes
 * Matched when |delta| <= tolerance (inclusive), Extra otherwise. A
 * reference becomes Miss once the stream passes its window. Both outcomes
 * are final.
 */
export class MatchingEngine {
  readonly pattern: Pattern;
  private readonly tolerances: number[];
  private readonly gradeRatios: GradeRatios;
  private readonly queues = new Map<string, OpenQueue>();
  private readonly byDeadline: number[];
  private deadlineCursor = 0;
  private results: Array<ReferenceResult | null>;
  private candidates: CandidateResult[] = [];
  private pending: number;
  private outcome: MatchOutcome | null = null;
  private cancelled = false;

  constructor(pattern: Pattern, opts: MatchingOptions = {}) {
    const policy = opts.keyRepeatPolicy ?? DEFAULT_CONFIG.keyRepeatPolicy;
    if (policy !== 'strict-fifo') throw new Error(`Unsupported key repeat policy: ${String(policy)}`);

    this.pattern = pattern;
    this.gradeRatios = opts.gradeRatios ?? DEFAULT_CONFIG.gradeRatios;
    this.tolerances = pattern.actions.map(a => toleranceOf(pattern, a));
    this.results = pattern.actions.map(() => null);
    this.pending = pattern.actions.length;

    pattern.actions.forEach((a, i) => {
      const k = queueKey(a.action, a.key);
      const q = this.queues.get(k);
      if (q) q.refs.push(i);
      else this.queues.set(k, { refs: [i], head: 0 });
    });

    const deadline = (i: number) => pattern.actions[i].time + this.tolerances[i] / 1000;
    this.byDeadline = pattern.actions.map((_, i) => i).sort((a, b) => deadline(a) - deadline(b) || a - b);
  }

  /**
   * Close every reference whose window the stream has passed. Moving
   * backwards (a seek) closes nothing and reopens nothing.
   */
  advanceTo(time: LogicalTime): MatchFeedback[] {
    this.assertActive();
    const closed: MatchFeedback[] = [];
    while (this.deadlineCursor < this.byDeadline.length) {
      const i = this.byDeadline[this.deadlineCursor];
      if (this.results[i] === null) {
        if (!this.expired(i, time)) break;
        closed.push(this.close(i));
      }
      this.deadlineCursor++;
    }
    return closed;
  }

  /**
   * Commit one candidate. Returns the misses the arrival uncovered followed
   * by the candidate's own classification.
   */
  receive(event: InputEvent): MatchFeedback[] {
    const feedback = this.advanceTo(event.time);
    const candidate = this.candidates.length;
    const q = this.queues.get(queueKey(event.action, event.key));

    let ref = q ? this.head(q) : undefined;
    // windows ending within the quantization of their deadline order
    while (q && ref !== undefined && this.expired(ref, event.time)) {
      feedback.push(this.close(ref));
      ref = this.head(q);
    }

    if (ref !== undefined) {
      const action = this.pattern.actions[ref];
      const delta = deltaMs(event.time, action.time);
      const tolerance = this.tolerances[ref];
      if (Math.abs(delta) <= tolerance) {
        const grade = gradeHit(Math.abs(delta), tolerance, this.gradeRatios);
        this.results[ref] = { kind: 'hit', deltaMs: delta, candidate, grade };
        this.pending--;
        this.candidates.push({ kind: 'matched', reference: ref });
        log.debug(`Hit ${event.action} '${event.key}' ref=${ref} delta=${delta}ms (${grade})`);
        feedback.push({ kind: 'hit', reference: ref, candidate, action, event, deltaMs: delta, grade });
        return feedback;
      }
    }

    this.candidates.push({ kind: 'extra' });
    log.debug(`Extra ${event.action} '${event.key}' at ${event.time}s`);
    feedback.push({ kind: 'extra', candidate, event });
    return feedback;
  }

  /**
   * End of stream: every reference still pending becomes Miss. These misses
   * are not returned as feedback. Returns the frozen outcome; calling it
   * again returns the same object.
   */
  finish(): MatchOutcome {
    if (this.outcome) return this.outcome;
    this.assertActive();
    this.results.forEach((r, i) => {
      if (r === null) this.close(i);
    });
    const references: ReferenceResult[] = this.results.map((r): ReferenceResult => r ?? { kind: 'miss' });
    this.outcome = deepFreeze<MatchOutcome>({ references, candidates: [...this.candidates] });
    return this.outcome;
  }

  pendingCount(): number {
    return this.pending;
  }

  candidateCount(): number {
    return this.candidates.length;
  }

  isFinished(): boolean {
    return this.outcome !== null;
  }

  /** Drop all in-flight state; the engine cannot be used afterwards. */
  cancel(): void {
    this.cancelled = true;
    this.queues.clear();
    this.candidates = [];
    this.results = [];
    this.pending = 0;
  }

  private assertActive(): void {
    if (this.cancelled) throw new Error('Matching engine was cancelled');
    if (this.outcome) throw new Error('Matching engine already finished');
  }

  private head(q: OpenQueue): number | undefined {
    while (q.head < q.refs.length && this.results[q.refs[q.head]] !== null) q.head++;
    return q.head < q.refs.length ? q.refs[q.head] : undefined;
  }

  private expired(ref: number, time: LogicalTime): boolean {
    return deltaMs(time, this.pattern.actions[ref].time) > this.tolerances[ref];
  }

  private close(ref: number): MatchFeedback {
    this.results[ref] = { kind: 'miss' };
    this.pending--;
    const action = this.pattern.actions[ref];
    log.debug(`Miss ${action.action} '${action.key}' ref=${ref} at ${action.time}s`);
    return { kind: 'miss', reference: ref, action };
  }
}

/** Replay a recorded stream through a fresh engine. */
export function matchEvents(pattern: Pattern, events: readonly InputEvent[], opts: MatchingOptions = {}): MatchOutcome {
  const engine = new MatchingEngine(pattern, opts);
  for (const ev of events) engine.receive(ev);
  return engine.finish();
}

export default MatchingEngine;
