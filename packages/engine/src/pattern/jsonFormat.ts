/*
 * JSON persistence for patterns and recordings.
 *
 * Canonical shape:
 *   { name, source_id, total_duration, created_at, default_tolerance_ms,
 *     events: [{ time, key, action, tolerance_ms? }] }
 *
 * The legacy recording shape (video_url, duration, recording_date,
 * keystrokes) is accepted on load, as are frame-indexed events
 * ({ frame, key, action }) when a frame rate is supplied.
 */
import { DEFAULT_CONFIG } from '../config.js';
import { MalformedPatternError, MalformedRecordingError } from '../errors.js';
import { Anomaly, deepFreeze, isKeyAction, InputEvent, Pattern, PatternAction, Recording } from '../model.js';
import { normalizeKey } from '../recorder/keys.js';
import { enforcePairing, sortByTime } from '../recorder/pairing.js';

export interface EventRecord {
  time: number;
  key: string;
  action: 'press' | 'release';
  tolerance_ms?: number;
}

export interface PatternFile {
  name: string;
  source_id: string;
  total_duration: number;
  created_at: string;
  default_tolerance_ms: number;
  events: EventRecord[];
}

export interface RecordingFile {
  source_id: string;
  total_duration: number;
  created_at: string;
  events: EventRecord[];
  anomalies?: Anomaly[];
}

export interface ParseOptions {
  /** Frame rate used to convert `{ frame }` events into seconds. */
  fps?: number;
  /** Fallback name when the record has none. */
  name?: string;
  /** Fallback tolerance when the record has none. */
  defaultToleranceMs?: number;
  /** File name or id, for error messages. */
  source?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTime(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

function firstDefined(data: Record<string, unknown>, ...keys: string[]): unknown {
  for (const k of keys) {
    if (data[k] !== undefined) return data[k];
  }
  return undefined;
}

function readString(data: Record<string, unknown>, keys: string[], fallback: string, problems: string[]): string {
  const value = firstDefined(data, ...keys);
  if (value === undefined) return fallback;
  if (typeof value !== 'string') {
    problems.push(`'${keys[0]}' must be a string`);
    return fallback;
  }
  return value;
}

function readDuration(data: Record<string, unknown>, problems: string[]): number {
  const value = firstDefined(data, 'total_duration', 'duration');
  if (value === undefined) return 0;
  if (!isTime(value)) {
    problems.push(`'total_duration' must be a non-negative number`);
    return 0;
  }
  return value;
}

function parseEvents(data: Record<string, unknown>, opts: ParseOptions, problems: string[], asPattern: boolean): PatternAction[] {
  const list = firstDefined(data, 'events', 'keystrokes');
  if (!Array.isArray(list)) {
    problems.push(`missing or invalid 'events' array`);
    return [];
  }

  const events: PatternAction[] = [];
  list.forEach((item: unknown, i: number) => {
    if (!isRecord(item)) {
      problems.push(`event ${i} must be an object`);
      return;
    }

    let time: number | undefined;
    if (item.time !== undefined) {
      if (isTime(item.time)) time = item.time;
      else problems.push(`event ${i} has a non-numeric or negative time: ${JSON.stringify(item.time)}`);
    } else if (item.frame !== undefined) {
      if (!isTime(item.frame)) problems.push(`event ${i} has a non-numeric or negative frame: ${JSON.stringify(item.frame)}`);
      else if (!(typeof opts.fps === 'number' && opts.fps > 0)) problems.push(`event ${i} is frame-indexed but no frame rate was given`);
      else time = item.frame / opts.fps;
    } else {
      problems.push(`event ${i} has no time`);
    }

    // Pattern keys stay as authored; recorded keys are normalized.
    const raw = typeof item.key === 'string' ? item.key : '';
    const key = asPattern ? raw : normalizeKey(raw);
    if (!key.trim()) problems.push(`event ${i} has a missing or empty key`);

    if (!isKeyAction(item.action)) {
      problems.push(`event ${i} has unknown action ${JSON.stringify(item.action)}`);
      return;
    }

    let toleranceMs: number | undefined;
    if (asPattern && item.tolerance_ms !== undefined) {
      if (typeof item.tolerance_ms === 'number' && Number.isFinite(item.tolerance_ms) && item.tolerance_ms > 0) {
        toleranceMs = item.tolerance_ms;
      } else {
        problems.push(`event ${i} has an invalid tolerance_ms: ${JSON.stringify(item.tolerance_ms)}`);
      }
    }

    if (time === undefined || !key.trim()) return;
    const action: PatternAction = { time, key, action: item.action };
    if (toleranceMs !== undefined) action.toleranceMs = toleranceMs;
    events.push(action);
  });

  return events;
}

/**
 * Validate a parsed JSON record and build a frozen Pattern.
 * Throws MalformedPatternError listing every problem found.
 */
export function parsePattern(data: unknown, opts: ParseOptions = {}): Pattern {
  if (!isRecord(data)) throw new MalformedPatternError(['pattern must be a JSON object'], opts.source);

  const problems: string[] = [];
  const sourceId = readString(data, ['source_id', 'video_url'], '', problems);
  const name = readString(data, ['name'], opts.name ?? (sourceId || 'untitled'), problems);
  const createdAt = readString(data, ['created_at', 'recording_date'], '', problems);
  const totalDuration = readDuration(data, problems);

  let defaultToleranceMs = opts.defaultToleranceMs ?? DEFAULT_CONFIG.defaultToleranceMs;
  if (data.default_tolerance_ms !== undefined) {
    const tol = data.default_tolerance_ms;
    if (typeof tol === 'number' && Number.isFinite(tol) && tol > 0) defaultToleranceMs = tol;
    else problems.push(`'default_tolerance_ms' must be a positive number`);
  }

  const actions = sortByTime(parseEvents(data, opts, problems, true));
  // A repeated press is legal in a drill; only a release with nothing held is not.
  const paired = enforcePairing(actions.map(a => ({ ...a, key: normalizeKey(a.key) })));
  for (const a of paired.anomalies) {
    if (a.kind === 'orphan-release') problems.push(`release of '${a.key}' at ${a.time}s has no preceding press`);
  }

  if (problems.length > 0) throw new MalformedPatternError(problems, opts.source);

  return deepFreeze<Pattern>({ name, sourceId, totalDuration, createdAt, defaultToleranceMs, actions });
}

function toEventRecord(ev: InputEvent & { toleranceMs?: number }): EventRecord {
  const rec: EventRecord = { time: ev.time, key: ev.key, action: ev.action };
  if (ev.toleranceMs !== undefined) rec.tolerance_ms = ev.toleranceMs;
  return rec;
}

/** Inverse of parsePattern. */
export function serializePattern(pattern: Pattern): PatternFile {
  return {
    name: pattern.name,
    source_id: pattern.sourceId,
    total_duration: pattern.totalDuration,
    created_at: pattern.createdAt,
    default_tolerance_ms: pattern.defaultToleranceMs,
    events: pattern.actions.map(toEventRecord),
  };
}

function parseAnomalies(value: unknown): Anomaly[] {
  if (!Array.isArray(value)) return [];
  const out: Anomaly[] = [];
  for (const item of value) {
    if (!isRecord(item) || typeof item.key !== 'string' || !isTime(item.time)) continue;
    if (item.kind === 'orphan-release' || item.kind === 'repeat-press') {
      out.push({ kind: item.kind, key: item.key, time: item.time });
    }
  }
  return out;
}

/**
 * Load a persisted recording. Structural problems throw; pairing violations
 * are dropped and annotated, as they are while recording.
 */
export function parseRecording(data: unknown, opts: ParseOptions = {}): Recording {
  if (!isRecord(data)) throw new MalformedRecordingError(['recording must be a JSON object'], opts.source);

  const problems: string[] = [];
  const sourceId = readString(data, ['source_id', 'video_url'], '', problems);
  const createdAt = readString(data, ['created_at', 'recording_date'], '', problems);
  const totalDuration = readDuration(data, problems);
  const parsed = parseEvents(data, opts, problems, false);
  if (problems.length > 0) throw new MalformedRecordingError(problems, opts.source);

  const paired = enforcePairing(sortByTime<InputEvent>(parsed));
  return deepFreeze<Recording>({
    sourceId,
    totalDuration,
    createdAt,
    events: paired.events,
    anomalies: [...parseAnomalies(data.anomalies), ...paired.anomalies],
  });
}

export function serializeRecording(recording: Recording): RecordingFile {
  const out: RecordingFile = {
    source_id: recording.sourceId,
    total_duration: recording.totalDuration,
    created_at: recording.createdAt,
    events: recording.events.map(toEventRecord),
  };
  if (recording.anomalies.length > 0) out.anomalies = recording.anomalies.map(a => ({ ...a }));
  return out;
}

export interface PatternFromRecordingOptions {
  name?: string;
  defaultToleranceMs?: number;
}

/** Promote a recorded session to an authored reference pattern. */
export function patternFromRecording(recording: Recording, opts: PatternFromRecordingOptions = {}): Pattern {
  const data: PatternFile = {
    name: opts.name ?? (recording.sourceId || 'untitled'),
    source_id: recording.sourceId,
    total_duration: recording.totalDuration,
    created_at: recording.createdAt,
    default_tolerance_ms: opts.defaultToleranceMs ?? DEFAULT_CONFIG.defaultToleranceMs,
    events: recording.events.map(toEventRecord),
  };
  return parsePattern(data);
}
