import { Anomaly, deepFreeze, InputEvent, KeyAction, LogicalTime, Recording } from '../model.js';
import { warn } from '../util/diag.js';
import { createLogger } from '../util/logger.js';
import { normalizeKey } from './keys.js';
import { applyPairing, enforcePairing, pairingViolation, sortByTime } from './pairing.js';

const log = createLogger('recorder');

export interface EventRecorderOptions {
  sourceId?: string;
  /** Length of the reference video; defaults to the latest time seen. */
  totalDuration?: LogicalTime;
  /** Keys that are never recorded, compared after normalization. */
  ignoreKeys?: readonly string[];
  /** ISO-8601 creation stamp; defaults to the construction instant. */
  createdAt?: string;
}

export type RecordOutcome =
  | { kind: 'recorded'; event: InputEvent }
  | { kind: 'dropped'; anomaly: Anomaly }
  | { kind: 'ignored'; reason: 'ignored-key' | 'finalized' | 'invalid-time' };

/**
 * Builds a Recording incrementally during a session.
 *
 * Pairing violations are dropped and kept as anomalies; the session carries
 * on. After a backward seek the stream is re-sorted on finalize.
 */
export class EventRecorder {
  private readonly sourceId: string;
  private readonly createdAt: string;
  private readonly ignoreKeys: Set<string>;
  private totalDuration: LogicalTime | undefined;
  private events: InputEvent[] = [];
  private anomalies: Anomaly[] = [];
  private held = new Set<string>();
  private lastTime = 0;
  private latest = 0;
  private reordered = false;
  private frozen: Recording | null = null;

  constructor(opts: EventRecorderOptions = {}) {
    this.sourceId = opts.sourceId ?? '';
    this.createdAt = opts.createdAt ?? new Date().toISOString();
    this.ignoreKeys = new Set((opts.ignoreKeys ?? []).map(normalizeKey));
    this.totalDuration = opts.totalDuration;
  }

  record(raw: { key: string; action: KeyAction }, time: LogicalTime): RecordOutcome {
    if (this.frozen) {
      log.warn(`Ignoring ${raw.action} of '${raw.key}' after finalize`);
      return { kind: 'ignored', reason: 'finalized' };
    }
    if (!Number.isFinite(time) || time < 0) {
      log.warn(`Ignoring ${raw.action} of '${raw.key}' at invalid time ${time}`);
      return { kind: 'ignored', reason: 'invalid-time' };
    }

    const key = normalizeKey(raw.key);
    if (this.ignoreKeys.has(key)) return { kind: 'ignored', reason: 'ignored-key' };

    const event: InputEvent = { time, key, action: raw.action };
    const violation = pairingViolation(this.held, event);
    if (violation) {
      const anomaly: Anomaly = { kind: violation, key, time };
      this.anomalies.push(anomaly);
      warn('recorder', violation === 'orphan-release' ? 'Dropped release with no outstanding press' : 'Dropped repeated press of a held key', { key, time });
      return { kind: 'dropped', anomaly };
    }

    if (this.events.length > 0 && time < this.lastTime) this.reordered = true;
    applyPairing(this.held, event);
    this.events.push(event);
    this.lastTime = time;
    this.latest = Math.max(this.latest, time);
    return { kind: 'recorded', event };
  }

  /** Extend the known timeline without recording an event (clock ticks). */
  observe(time: LogicalTime): void {
    if (Number.isFinite(time)) this.latest = Math.max(this.latest, time);
  }

  setTotalDuration(duration: LogicalTime): void {
    this.totalDuration = duration;
  }

  heldKeys(): string[] {
    return [...this.held];
  }

  size(): number {
    return this.events.length;
  }

  isFinalized(): boolean {
    return this.frozen !== null;
  }

  /**
   * Freeze the recording. Calling it again returns the same Recording.
   */
  finalize(): Recording {
    if (this.frozen) return this.frozen;

    let events = this.events;
    const anomalies = [...this.anomalies];
    if (this.reordered) {
      const sorted = enforcePairing(sortByTime(events));
      for (const a of sorted.anomalies) {
        warn('recorder', `Dropped ${a.kind} exposed by a backward seek`, { key: a.key, time: a.time });
      }
      events = sorted.events;
      anomalies.push(...sorted.anomalies);
    }

    this.frozen = deepFreeze<Recording>({
      sourceId: this.sourceId,
      totalDuration: this.totalDuration ?? this.latest,
      createdAt: this.createdAt,
      events: events.map(ev => ({ ...ev })),
      anomalies,
    });
    log.debug(`Finalized recording with ${events.length} events and ${anomalies.length} anomalies`);
    return this.frozen;
  }
}

export default EventRecorder;
