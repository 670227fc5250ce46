import { existsSync, readFileSync, statSync } from 'fs';
import { join } from 'path';
import {
  ClockSample,
  formatDelta,
  formatReport,
  isKeyAction,
  MalformedRecordingError,
  Pattern,
  RawInputEvent,
  recordingId,
  TrainingSession,
} from '@dojo-trainer/engine';
import { CliContext, openFile, reportError } from '../context.js';

export interface SessionOptions {
  /** Pattern to score the session against. */
  pattern?: string;
  /** File or directory to save the recording to. */
  out?: string;
}

type TimelineEntry = { type: 'tick'; sample: ClockSample } | { type: 'input'; raw: RawInputEvent };

export interface Timeline {
  sourceId?: string;
  entries: TimelineEntry[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Validate a captured timeline: either an array of entries or
 * `{ source_id?, events: [...] }`. Entries are `{ type: 'tick', wall_time,
 * reading, paused?, seek?, rate? }` or `{ type: 'input', wall_time, key, action }`.
 */
export function parseTimeline(data: unknown, source?: string): Timeline {
  const problems: string[] = [];
  let list: unknown = data;
  let sourceId: string | undefined;
  if (isRecord(data)) {
    list = data.events;
    if (typeof data.source_id === 'string') sourceId = data.source_id;
  }
  if (!Array.isArray(list)) throw new MalformedRecordingError([`timeline must be an array of events`], source);

  const entries: TimelineEntry[] = [];
  list.forEach((item: unknown, i: number) => {
    if (!isRecord(item) || !isNumber(item.wall_time)) {
      problems.push(`entry ${i} needs a numeric wall_time`);
      return;
    }
    if (item.type === 'tick') {
      if (!isNumber(item.reading)) {
        problems.push(`entry ${i} is a tick without a numeric reading`);
        return;
      }
      const sample: ClockSample = { wallTime: item.wall_time, reading: item.reading, isPaused: item.paused === true };
      if (item.seek === true) sample.seek = true;
      if (isNumber(item.rate)) sample.rate = item.rate;
      entries.push({ type: 'tick', sample });
    } else if (item.type === 'input') {
      if (typeof item.key !== 'string' || !isKeyAction(item.action)) {
        problems.push(`entry ${i} is an input without a key and a press/release action`);
        return;
      }
      entries.push({ type: 'input', raw: { key: item.key, action: item.action, wallTime: item.wall_time } });
    } else {
      problems.push(`entry ${i} has unknown type ${JSON.stringify(item.type)}`);
    }
  });

  if (problems.length > 0) throw new MalformedRecordingError(problems, source);
  return { sourceId, entries };
}

function recordingTarget(out: string): string {
  const isDir = /[\\/]$/.test(out) || (existsSync(out) && statSync(out).isDirectory());
  return isDir ? join(out, recordingId()) : out;
}

/** Replay a captured clock/input timeline through a live training session. */
export async function sessionCommand(ctx: CliContext, timelineFile: string, opts: SessionOptions = {}): Promise<number> {
  try {
    const timeline = parseTimeline(JSON.parse(readFileSync(timelineFile, 'utf8')), timelineFile);
    let pattern: Pattern | undefined;
    if (opts.pattern) {
      const p = openFile(opts.pattern, ctx.config);
      pattern = p.store.load(p.id);
    }

    const session = new TrainingSession({ sourceId: timeline.sourceId, pattern, config: ctx.config });
    const { bus } = session;
    bus.on('feedback:hit', fb =>
      ctx.stdout(`hit    ${fb.action.action} ${fb.action.key} at ${fb.event.time.toFixed(3)}s (${formatDelta(fb.deltaMs)}, ${fb.grade})`)
    );
    bus.on('feedback:miss', fb => ctx.stdout(`miss   ${fb.action.action} ${fb.action.key} due ${fb.action.time.toFixed(3)}s`));
    bus.on('feedback:extra', fb => ctx.stdout(`extra  ${fb.event.action} ${fb.event.key} at ${fb.event.time.toFixed(3)}s`));
    bus.on('recorder:anomaly', ({ anomaly }) => {
      if (ctx.verbose) ctx.stdout(`anomaly ${anomaly.kind} ${anomaly.key} at ${anomaly.time.toFixed(3)}s`);
    });
    bus.on('clock:regression', ({ regression }) => {
      if (ctx.verbose) ctx.stdout(`clock went back from ${regression.from}s to ${regression.to}s`);
    });

    const running = session.run();
    for (const entry of timeline.entries) {
      if (entry.type === 'tick') session.tick(entry.sample);
      else session.input(entry.raw);
    }
    session.stop();
    const result = await running;

    if (result.report && pattern) formatReport(result.report, pattern.name).forEach(line => ctx.stdout(line));
    else ctx.stdout(`Recorded ${result.recording.events.length} events`);

    if (opts.out) {
      const target = recordingTarget(opts.out);
      const dest = openFile(target, ctx.config);
      dest.store.saveRecording(result.recording, dest.id);
      ctx.stdout(`Saved recording to ${target}`);
    }
    return 0;
  } catch (err) {
    return reportError(ctx, `Session failed for ${timelineFile}`, err);
  }
}
