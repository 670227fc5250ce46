import { Anomaly, InputEvent, LogicalTime } from '../model.js';

export interface PairingResult<T extends InputEvent> {
  events: T[];
  anomalies: Anomaly[];
}

/**
 * Walk events in order and keep only those that respect press/release
 * pairing: a release needs an outstanding press of the same key, and a key
 * can only be pressed once before it is released again.
 */
export function enforcePairing<T extends InputEvent>(events: readonly T[]): PairingResult<T> {
  const held = new Set<string>();
  const kept: T[] = [];
  const anomalies: Anomaly[] = [];

  for (const ev of events) {
    const violation = pairingViolation(held, ev);
    if (violation) {
      anomalies.push({ kind: violation, key: ev.key, time: ev.time });
      continue;
    }
    applyPairing(held, ev);
    kept.push(ev);
  }

  return { events: kept, anomalies };
}

/** Anomaly an event would cause against the set of held keys, if any. */
export function pairingViolation(held: ReadonlySet<string>, ev: InputEvent): Anomaly['kind'] | null {
  if (ev.action === 'release') return held.has(ev.key) ? null : 'orphan-release';
  return held.has(ev.key) ? 'repeat-press' : null;
}

export function applyPairing(held: Set<string>, ev: InputEvent): void {
  if (ev.action === 'press') held.add(ev.key);
  else held.delete(ev.key);
}

/** A press together with the release that ended it. */
export interface HeldKey {
  key: string;
  pressTime: LogicalTime;
  /** null when the key was still held at the end of the stream. */
  releaseTime: LogicalTime | null;
}

/** Pair presses with their releases. Assumes pairing has been enforced. */
export function pairHolds(events: readonly InputEvent[]): HeldKey[] {
  const open = new Map<string, HeldKey>();
  const holds: HeldKey[] = [];

  for (const ev of events) {
    if (ev.action === 'press') {
      const hold: HeldKey = { key: ev.key, pressTime: ev.time, releaseTime: null };
      open.set(ev.key, hold);
      holds.push(hold);
    } else {
      const hold = open.get(ev.key);
      if (hold) {
        hold.releaseTime = ev.time;
        open.delete(ev.key);
      }
    }
  }

  return holds;
}

/** Stable sort by time; equal times keep their original order. */
export function sortByTime<T extends InputEvent>(events: readonly T[]): T[] {
  return events
    .map((ev, index) => ({ ev, index }))
    .sort((a, b) => a.ev.time - b.ev.time || a.index - b.index)
    .map(({ ev }) => ev);
}
