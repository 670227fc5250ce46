import { existsSync, mkdirSync, mkdtempSync, readdirSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { FileStorage, PatternStore, resolveConfig } from '@dojo-trainer/engine';
import { convertCommand, inspectCommand, listCommand, scoreCommand, sessionCommand, upcomingCommand, verifyCommand } from '../src/commands';
import { parseTimeline } from '../src/commands/session';
import { CliContext } from '../src/context';

const DRILL = {
  name: 'Drill',
  total_duration: 3,
  default_tolerance_ms: 100,
  events: [
    { time: 1, key: 'a', action: 'press' },
    { time: 1.5, key: 'a', action: 'release' },
    { time: 2, key: 'b', action: 'press' },
    { time: 2.5, key: 'b', action: 'release' },
  ],
};

const TAKE = {
  source_id: 'clip',
  total_duration: 3,
  created_at: '2026-03-04T05:06:07.000Z',
  events: [
    { time: 1.02, key: 'a', action: 'press' },
    { time: 1.56, key: 'a', action: 'release' },
    { time: 2, key: 'b', action: 'press' },
    { time: 2.45, key: 'b', action: 'release' },
  ],
};

const REC = {
  source_id: 'clip',
  total_duration: 2,
  created_at: '2026-03-04T05:06:07.000Z',
  events: [
    { time: 1, key: 'a', action: 'press' },
    { time: 1.5, key: 'a', action: 'release' },
    { time: 1.8, key: 'b', action: 'press' },
  ],
};

const TIMELINE = {
  source_id: 'clip',
  events: [
    { type: 'tick', wall_time: 100, reading: 0 },
    { type: 'tick', wall_time: 101, reading: 1 },
    { type: 'input', wall_time: 101.02, key: 'a', action: 'press' },
    { type: 'input', wall_time: 101.5, key: 'a', action: 'release' },
    { type: 'tick', wall_time: 102, reading: 2 },
    { type: 'input', wall_time: 102, key: 'b', action: 'press' },
    { type: 'tick', wall_time: 103, reading: 3 },
  ],
};

function makeContext(overrides: Partial<CliContext> = {}) {
  const out: string[] = [];
  const err: string[] = [];
  const ctx: CliContext = {
    config: resolveConfig({}),
    verbose: false,
    debug: false,
    stdout: line => out.push(line),
    stderr: line => err.push(line),
    ...overrides,
  };
  return { ctx, out, err };
}

let dir: string;

function fixture(name: string, data: unknown): string {
  const path = join(dir, name);
  writeFileSync(path, typeof data === 'string' ? data : JSON.stringify(data), 'utf8');
  return path;
}

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'dojo-cli-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('verify', () => {
  test('prints a summary for a valid pattern', () => {
    const path = fixture('drill.json', DRILL);
    const { ctx, out } = makeContext();
    expect(verifyCommand(ctx, path)).toBe(0);
    expect(out).toEqual([`OK ${path}: 4 actions, 3s, tolerance 100ms`]);
  });

  test('lists problems and exits 2 for an invalid pattern', () => {
    const path = fixture('bad.json', { events: [{ time: 1, key: 'a', action: 'release' }] });
    const { ctx, out, err } = makeContext();
    expect(verifyCommand(ctx, path)).toBe(2);
    expect(out).toEqual([]);
    expect(err).toEqual([`Validation failed for ${path}:`, `  - release of 'a' at 1s has no preceding press`]);
  });

  test('exits 1 when the file cannot be read', () => {
    const path = join(dir, 'missing.json');
    const { ctx, err } = makeContext();
    expect(verifyCommand(ctx, path)).toBe(1);
    expect(err).toHaveLength(1);
    expect(err[0].startsWith(`Validation failed for ${path}: ENOENT`)).toBe(true);
  });
});

describe('inspect', () => {
  test('describes a pattern', () => {
    const path = fixture('drill.json', DRILL);
    const { ctx, out } = makeContext();
    expect(inspectCommand(ctx, path)).toBe(0);
    expect(out).toEqual([
      'Pattern: Drill',
      'Source: -',
      'Created: -',
      'Duration: 3s',
      'Tolerance: 100ms',
      'Actions: 4 (2 press, 2 release)',
      'Keys: a, b',
      'Holds:',
      '  a 1.000s -> 1.500s (500.0ms)',
      '  b 2.000s -> 2.500s (500.0ms)',
    ]);
  });

  test('describes a recording', () => {
    const path = fixture('rec.json', REC);
    const { ctx, out } = makeContext();
    expect(inspectCommand(ctx, path, { recording: true })).toBe(0);
    expect(out).toEqual([
      'Recording of: clip',
      'Created: 2026-03-04T05:06:07.000Z',
      'Duration: 2s',
      'Events: 3',
      'Keys: a, b',
      'Anomalies: 0',
      'Holds:',
      '  a 1.000s -> 1.500s (500.0ms)',
      '  b 1.800s -> (held)',
    ]);
  });

  test('prints the canonical JSON document', () => {
    const path = fixture('drill.json', { events: DRILL.events });
    const { ctx, out } = makeContext();
    expect(inspectCommand(ctx, path, { json: true })).toBe(0);
    expect(JSON.parse(out.join('\n'))).toEqual({
      name: 'drill',
      source_id: '',
      total_duration: 0,
      created_at: '',
      default_tolerance_ms: 100,
      events: DRILL.events,
    });
  });
});

describe('convert', () => {
  test('rewrites JSON as text', () => {
    const input = fixture('drill.json', DRILL);
    const output = join(dir, 'drill.pat');
    const { ctx, out } = makeContext();
    expect(convertCommand(ctx, input, output)).toBe(0);
    expect(out).toEqual([`Wrote ${output} (4 actions)`]);
    const store = new PatternStore(new FileStorage(dir));
    expect(store.load('drill.pat')).toEqual(store.load('drill.json'));
  });

  test('promotes a recording to a pattern', () => {
    const input = fixture('rec.json', REC);
    const output = join(dir, 'promoted.json');
    const { ctx, out } = makeContext({ config: resolveConfig({ default_tolerance_ms: 60 }) });
    expect(convertCommand(ctx, input, output, { fromRecording: true, name: 'Promoted' })).toBe(0);
    expect(out).toEqual([`Wrote ${output} (3 actions)`]);
    const pattern = new PatternStore(new FileStorage(dir)).load('promoted.json');
    expect(pattern.name).toBe('Promoted');
    expect(pattern.sourceId).toBe('clip');
    expect(pattern.defaultToleranceMs).toBe(60);
  });
});

describe('list', () => {
  test('lists pattern and recording documents', () => {
    fixture('rec.json', REC);
    fixture('drill.json', DRILL);
    fixture('notes.txt', 'not a pattern');
    const { ctx, out } = makeContext();
    expect(listCommand(ctx, dir)).toBe(0);
    expect(out).toEqual(['drill.json', 'rec.json']);
  });

  test('says so when the directory is empty', () => {
    const { ctx, out } = makeContext();
    expect(listCommand(ctx, dir)).toBe(0);
    expect(out).toEqual([`No patterns or recordings in ${dir}`]);
  });
});

describe('upcoming', () => {
  test('prints actions due within the lookahead', () => {
    const path = fixture('drill.json', DRILL);
    const { ctx, out } = makeContext();
    expect(upcomingCommand(ctx, path, { at: '1', lookahead: '1' })).toBe(0);
    expect(out).toEqual(['+0.500s  release  a', '+1.000s  press    b']);
  });

  test('says when nothing is due', () => {
    const path = fixture('drill.json', DRILL);
    const { ctx, out } = makeContext();
    expect(upcomingCommand(ctx, path, { at: '3' })).toBe(0);
    expect(out).toEqual(['Nothing due in the 5s after 3s']);
  });

  test('rejects a negative position', () => {
    const path = fixture('drill.json', DRILL);
    const { ctx, err } = makeContext();
    expect(upcomingCommand(ctx, path, { at: '-1' })).toBe(2);
    expect(err).toEqual([`Failed to read ${path}:`, `  - --at must be a non-negative number, got '-1'`]);
  });
});

describe('score', () => {
  test('prints the report', () => {
    const pattern = fixture('drill.json', DRILL);
    const take = fixture('take.json', TAKE);
    const { ctx, out } = makeContext();
    expect(scoreCommand(ctx, pattern, take)).toBe(0);
    expect(out).toEqual([
      'Pattern: Drill',
      'Score: 100.0/100',
      'Hits: 4  Misses: 0  Extras: 0  Early: 1  Late: 2',
      'Points: 350  Max combo: 4  Mean |delta|: 32.5ms',
      '  1.000s  press    a       HIT        +20.0ms (perfect)',
      '  1.500s  release  a       HIT        +60.0ms (good)',
      '  2.000s  press    b       HIT        0.0ms (perfect)',
      '  2.500s  release  b       HIT        -50.0ms (good)',
    ]);
  });

  test('tolerance and penalty overrides feed the JSON report', () => {
    const pattern = fixture('drill.json', DRILL);
    const take = fixture('take.json', TAKE);
    const { ctx, out } = makeContext();
    expect(scoreCommand(ctx, pattern, take, { json: true, tolerance: '50', penalty: '10' })).toBe(0);
    const report = JSON.parse(out.join('\n'));
    expect(report.totalScore).toBe(65);
    expect([report.hits, report.misses, report.extras]).toEqual([3, 1, 1]);
    expect(report.perAction.map((f: { label: string }) => f.label)).toEqual(['hit', 'miss', 'hit', 'too-early']);
  });

  test('a corrupt recording exits 2', () => {
    const pattern = fixture('drill.json', DRILL);
    const take = fixture('take.json', '{');
    const { ctx, err } = makeContext();
    expect(scoreCommand(ctx, pattern, take)).toBe(2);
    expect(err[0]).toBe(`Failed to score ${take}:`);
    expect(err[1].startsWith('  - invalid JSON: ')).toBe(true);
  });
});

describe('session', () => {
  test('replays a timeline with live feedback and a report', async () => {
    const pattern = fixture('drill.json', DRILL);
    const timeline = fixture('timeline.json', TIMELINE);
    const { ctx, out } = makeContext();
    expect(await sessionCommand(ctx, timeline, { pattern })).toBe(0);
    expect(out).toEqual([
      'hit    press a at 1.020s (+20.0ms, perfect)',
      'hit    release a at 1.500s (0.0ms, perfect)',
      'hit    press b at 2.000s (0.0ms, perfect)',
      'miss   release b due 2.500s',
      'Pattern: Drill',
      'Score: 75.0/100',
      'Hits: 3  Misses: 1  Extras: 0  Early: 0  Late: 1',
      'Points: 300  Max combo: 3  Mean |delta|: 6.7ms',
      '  1.000s  press    a       HIT        +20.0ms (perfect)',
      '  1.500s  release  a       HIT        0.0ms (perfect)',
      '  2.000s  press    b       HIT        0.0ms (perfect)',
      '  2.500s  release  b       MISS       -',
    ]);
  });

  test('records without a pattern and saves the recording', async () => {
    const timeline = fixture('timeline.json', TIMELINE);
    const target = join(dir, 'out', 'take.json');
    const { ctx, out } = makeContext();
    expect(await sessionCommand(ctx, timeline, { out: target })).toBe(0);
    expect(out).toEqual(['Recorded 3 events', `Saved recording to ${target}`]);
    const rec = new PatternStore(new FileStorage(join(dir, 'out'))).loadRecording('take.json');
    expect(rec.sourceId).toBe('clip');
    expect(rec.events.map(e => `${e.action} ${e.key}`)).toEqual(['press a', 'release a', 'press b']);
    expect(rec.totalDuration).toBe(3);
  });

  test('names the recording when the target is a directory', async () => {
    const timeline = fixture('timeline.json', TIMELINE);
    const target = join(dir, 'recordings');
    mkdirSync(target);
    const { ctx } = makeContext();
    expect(await sessionCommand(ctx, timeline, { out: target })).toBe(0);
    const files = readdirSync(target);
    expect(files).toHaveLength(1);
    expect(files[0]).toMatch(/^recording_\d{8}_\d{6}\.json$/);
  });

  test('verbose output includes anomalies', async () => {
    const timeline = fixture('timeline.json', [
      { type: 'tick', wall_time: 10, reading: 0 },
      { type: 'input', wall_time: 10.25, key: 'x', action: 'release' },
    ]);
    const { ctx, out } = makeContext({ verbose: true });
    expect(await sessionCommand(ctx, timeline)).toBe(0);
    expect(out).toEqual(['anomaly orphan-release x at 0.250s', 'Recorded 0 events']);
  });

  test('a malformed timeline exits 2 with every problem', async () => {
    const timeline = fixture('timeline.json', [
      { type: 'tick', wall_time: 0 },
      { type: 'jump', wall_time: 1 },
      { key: 'a' },
    ]);
    const { ctx, err } = makeContext();
    expect(await sessionCommand(ctx, timeline)).toBe(2);
    expect(err).toEqual([
      `Session failed for ${timeline}:`,
      '  - entry 0 is a tick without a numeric reading',
      '  - entry 1 has unknown type "jump"',
      '  - entry 2 needs a numeric wall_time',
    ]);
    expect(existsSync(join(dir, 'recordings'))).toBe(false);
  });
});

describe('parseTimeline', () => {
  test('reads ticks with optional seek and rate', () => {
    const timeline = parseTimeline([
      { type: 'tick', wall_time: 1, reading: 0, paused: true },
      { type: 'tick', wall_time: 2, reading: 5, seek: true, rate: 2 },
      { type: 'input', wall_time: 2.5, key: 'Key.space', action: 'press' },
    ]);
    expect(timeline).toEqual({
      sourceId: undefined,
      entries: [
        { type: 'tick', sample: { wallTime: 1, reading: 0, isPaused: true } },
        { type: 'tick', sample: { wallTime: 2, reading: 5, isPaused: false, seek: true, rate: 2 } },
        { type: 'input', raw: { key: 'Key.space', action: 'press', wallTime: 2.5 } },
      ],
    });
  });

  test('rejects a document without events', () => {
    expect(() => parseTimeline({ source_id: 'clip' }, 'x.json')).toThrow('timeline must be an array of events');
  });
});
