import { DEFAULT_CONFIG } from '../src/config';
import { gradeHit, MatchingEngine, matchEvents } from '../src/matching/matchingEngine';
import { HitGrade, InputEvent, KeyAction, labelResult, Pattern } from '../src/model';
import { parsePattern } from '../src/pattern/jsonFormat';
import { score } from '../src/scoring/scoringEngine';

type Step = [number, KeyAction, string, number?];

function pattern(steps: Step[], defaultToleranceMs = 100): Pattern {
  return parsePattern({
    name: 'test',
    default_tolerance_ms: defaultToleranceMs,
    events: steps.map(([time, action, key, tol]) => (tol === undefined ? { time, action, key } : { time, action, key, tolerance_ms: tol })),
  });
}

const ev = (time: number, action: KeyAction, key: string): InputEvent => ({ time, action, key });

describe('MatchingEngine scenarios', () => {
  const single = pattern([[1.0, 'press', '1']]);

  test('a press 50ms late is a hit', () => {
    const outcome = matchEvents(single, [ev(1.05, 'press', '1')]);
    expect(outcome.references).toEqual([{ kind: 'hit', deltaMs: 50, candidate: 0, grade: 'good' }]);
    expect(outcome.candidates).toEqual([{ kind: 'matched', reference: 0 }]);
  });

  test('a press 200ms late misses and is extra', () => {
    const engine = new MatchingEngine(single);
    const feedback = engine.receive(ev(1.2, 'press', '1'));
    expect(feedback.map(f => f.kind)).toEqual(['miss', 'extra']);
    expect(engine.finish()).toEqual({ references: [{ kind: 'miss' }], candidates: [{ kind: 'extra' }] });
  });

  test('repeated presses of a key match in order', () => {
    const p = pattern([
      [1.0, 'press', '1'],
      [1.2, 'release', '1'],
      [2.0, 'press', '1'],
      [2.2, 'release', '1'],
    ]);
    const outcome = matchEvents(p, [ev(1.05, 'press', '1'), ev(1.25, 'release', '1'), ev(2.03, 'press', '1'), ev(2.23, 'release', '1')]);
    expect(outcome.references).toEqual([
      { kind: 'hit', deltaMs: 50, candidate: 0, grade: 'good' },
      { kind: 'hit', deltaMs: 50, candidate: 1, grade: 'good' },
      { kind: 'hit', deltaMs: 30, candidate: 2, grade: 'perfect' },
      { kind: 'hit', deltaMs: 30, candidate: 3, grade: 'perfect' },
    ]);
  });

  test('two presses of a key with no release between them both hit', () => {
    const p = pattern([
      [1.0, 'press', '1'],
      [2.0, 'press', '1'],
    ]);
    const outcome = matchEvents(p, [ev(1.0, 'press', '1'), ev(2.0, 'press', '1')]);
    expect(outcome.references).toEqual([
      { kind: 'hit', deltaMs: 0, candidate: 0, grade: 'perfect' },
      { kind: 'hit', deltaMs: 0, candidate: 1, grade: 'perfect' },
    ]);
    expect(outcome.candidates).toEqual([
      { kind: 'matched', reference: 0 },
      { kind: 'matched', reference: 1 },
    ]);
    expect(score(p, outcome).totalScore).toBe(100);
  });

  test('pattern keys match recorded keys after normalization', () => {
    const p = pattern([
      [1.0, 'press', 'Shift'],
      [1.5, 'release', 'Key.shift'],
    ]);
    const outcome = matchEvents(p, [ev(1.0, 'press', 'shift'), ev(1.5, 'release', 'shift')]);
    expect(outcome.references.map(r => r.kind)).toEqual(['hit', 'hit']);
    expect(outcome.candidates.map(c => c.kind)).toEqual(['matched', 'matched']);
  });

  test('a key absent from the pattern is extra at once', () => {
    const engine = new MatchingEngine(single);
    expect(engine.receive(ev(1.0, 'press', '2')).map(f => f.kind)).toEqual(['extra']);
    expect(engine.receive(ev(1.0, 'press', '1')).map(f => f.kind)).toEqual(['hit']);
    expect(engine.finish()).toEqual({
      references: [{ kind: 'hit', deltaMs: 0, candidate: 1, grade: 'perfect' }],
      candidates: [{ kind: 'extra' }, { kind: 'matched', reference: 0 }],
    });
  });

  test('a candidate only matches the same action', () => {
    const outcome = matchEvents(single, [ev(1.0, 'release', '1')]);
    expect(outcome.candidates).toEqual([{ kind: 'extra' }]);
    expect(outcome.references).toEqual([{ kind: 'miss' }]);
  });
});

describe('tolerance boundary', () => {
  const single = pattern([[1.0, 'press', '1']]);

  test('exactly at +tolerance is a hit', () => {
    const outcome = matchEvents(single, [ev(1.1, 'press', '1')]);
    expect(outcome.references).toEqual([{ kind: 'hit', deltaMs: 100, candidate: 0, grade: 'ok' }]);
    expect(labelResult(outcome.references[0])).toBe('too-late');
  });

  test('just past +tolerance is a miss', () => {
    const outcome = matchEvents(single, [ev(1.1001, 'press', '1')]);
    expect(outcome.references).toEqual([{ kind: 'miss' }]);
    expect(outcome.candidates).toEqual([{ kind: 'extra' }]);
  });

  test('exactly at -tolerance is a hit', () => {
    const outcome = matchEvents(single, [ev(0.9, 'press', '1')]);
    expect(outcome.references).toEqual([{ kind: 'hit', deltaMs: -100, candidate: 0, grade: 'ok' }]);
    expect(labelResult(outcome.references[0])).toBe('too-early');
  });

  test('just before -tolerance is extra and the reference stays open', () => {
    const engine = new MatchingEngine(single);
    expect(engine.receive(ev(0.8999, 'press', '1')).map(f => f.kind)).toEqual(['extra']);
    expect(engine.pendingCount()).toBe(1);
    expect(engine.finish().references).toEqual([{ kind: 'miss' }]);
  });

  test('per-action overrides narrow the window', () => {
    const p = pattern([[1.0, 'press', 'a', 50]]);
    expect(matchEvents(p, [ev(1.06, 'press', 'a')]).references).toEqual([{ kind: 'miss' }]);
    expect(matchEvents(p, [ev(1.05, 'press', 'a')]).references[0].kind).toBe('hit');
  });
});

describe('MatchingEngine behaviour', () => {
  test('only the earliest open reference of a key is considered', () => {
    const p = pattern([
      [1.0, 'press', 'a'],
      [1.05, 'release', 'a'],
      [1.1, 'press', 'a'],
      [1.15, 'release', 'a'],
    ]);
    const outcome = matchEvents(p, [ev(1.09, 'press', 'a')]);
    expect(outcome.references[0]).toEqual({ kind: 'hit', deltaMs: 90, candidate: 0, grade: 'ok' });
    expect(outcome.references[2]).toEqual({ kind: 'miss' });
  });

  test('advanceTo closes expired references and ignores backward moves', () => {
    const p = pattern([
      [1.0, 'press', 'a'],
      [3.0, 'press', 'b'],
    ]);
    const engine = new MatchingEngine(p);
    expect(engine.advanceTo(0.5)).toEqual([]);
    const closed = engine.advanceTo(1.2);
    expect(closed).toEqual([{ kind: 'miss', reference: 0, action: { time: 1, key: 'a', action: 'press' } }]);
    expect(engine.advanceTo(0.2)).toEqual([]);
    expect(engine.pendingCount()).toBe(1);
  });

  test('receive reports uncovered misses before the candidate', () => {
    const p = pattern([
      [1.0, 'press', 'a'],
      [2.0, 'press', 'b'],
    ]);
    const engine = new MatchingEngine(p);
    const feedback = engine.receive(ev(2.0, 'press', 'b'));
    expect(feedback.map(f => f.kind)).toEqual(['miss', 'hit']);
  });

  test('finish is idempotent and ends the stream', () => {
    const engine = new MatchingEngine(pattern([[1.0, 'press', 'a']]));
    const outcome = engine.finish();
    expect(engine.finish()).toBe(outcome);
    expect(engine.isFinished()).toBe(true);
    expect(Object.isFrozen(outcome.references)).toBe(true);
    expect(() => engine.receive(ev(1.0, 'press', 'a'))).toThrow('Matching engine already finished');
  });

  test('cancel discards state', () => {
    const engine = new MatchingEngine(pattern([[1.0, 'press', 'a']]));
    engine.receive(ev(1.0, 'press', 'a'));
    engine.cancel();
    expect(engine.pendingCount()).toBe(0);
    expect(engine.candidateCount()).toBe(0);
    expect(() => engine.advanceTo(2)).toThrow('Matching engine was cancelled');
  });

  test('an empty pattern makes every candidate extra', () => {
    const outcome = matchEvents(pattern([]), [ev(1, 'press', 'a')]);
    expect(outcome).toEqual({ references: [], candidates: [{ kind: 'extra' }] });
  });
});

describe('matching invariants', () => {
  // deterministic pseudo-random stream
  function lcg(seed: number): () => number {
    let s = seed;
    return () => {
      s = (s * 1664525 + 1013904223) % 4294967296;
      return s / 4294967296;
    };
  }

  const steps: Step[] = [];
  for (let i = 0; i < 40; i++) {
    const key = ['a', 'b', 'c'][i % 3];
    steps.push([i * 0.3, 'press', key], [i * 0.3 + 0.2, 'release', key]);
  }
  const p = pattern(steps, 80);

  test.each([1, 2, 3, 4, 5])('totality, one-to-one and order hold for stream %i', seed => {
    const rand = lcg(seed);
    const candidates: InputEvent[] = [];
    for (const a of p.actions) {
      const r = rand();
      if (r < 0.15) continue;
      candidates.push(ev(Math.max(0, a.time + (rand() - 0.5) * 0.3), a.action, a.key));
      if (r > 0.9) candidates.push(ev(a.time + 0.01, a.action, a.key));
    }
    candidates.sort((x, y) => x.time - y.time);

    const outcome = matchEvents(p, candidates);
    expect(outcome.references).toHaveLength(p.actions.length);
    expect(outcome.candidates).toHaveLength(candidates.length);

    const used = new Set<number>();
    const lastCandidate = new Map<string, number>();
    outcome.references.forEach((r, i) => {
      expect(['hit', 'miss']).toContain(r.kind);
      if (r.kind !== 'hit') return;
      expect(used.has(r.candidate)).toBe(false);
      used.add(r.candidate);
      expect(outcome.candidates[r.candidate]).toEqual({ kind: 'matched', reference: i });

      const ref = p.actions[i];
      const cand = candidates[r.candidate];
      expect([cand.key, cand.action]).toEqual([ref.key, ref.action]);
      expect(Math.abs(r.deltaMs)).toBeLessThanOrEqual(80);

      const q = `${ref.action}:${ref.key}`;
      expect(r.candidate).toBeGreaterThan(lastCandidate.get(q) ?? -1);
      lastCandidate.set(q, r.candidate);
    });
    expect(outcome.candidates.filter(c => c.kind === 'matched')).toHaveLength(used.size);
  });

  test('identical input gives an identical outcome', () => {
    const stream = p.actions.map(a => ev(a.time + 0.02, a.action, a.key));
    expect(matchEvents(p, stream)).toEqual(matchEvents(p, stream));
  });
});

describe('gradeHit', () => {
  const ratios = DEFAULT_CONFIG.gradeRatios;

  const cases: Array<[number, number, HitGrade]> = [
    [0, 100, 'perfect'],
    [37.5, 100, 'perfect'],
    [62.5, 100, 'good'],
    [62.6, 100, 'ok'],
    [100, 100, 'ok'],
  ];

  test.each(cases)('|delta| %p of %p ms is %p', (delta, tol, grade) => {
    expect(gradeHit(delta, tol, ratios)).toBe(grade);
  });
});
