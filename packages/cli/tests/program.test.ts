import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createProgram } from '../src/program';

describe('dojo program', () => {
  let dir: string;
  let out: string[];
  let err: string[];
  let codes: number[];

  const run = async (...args: string[]) => {
    const program = createProgram({
      stdout: line => out.push(line),
      stderr: line => err.push(line),
      onExit: code => codes.push(code),
    });
    program.exitOverride();
    await program.parseAsync(['node', 'dojo', ...args]);
  };

  const write = (name: string, data: unknown) => {
    const path = join(dir, name);
    writeFileSync(path, JSON.stringify(data), 'utf8');
    return path;
  };

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'dojo-program-'));
    out = [];
    err = [];
    codes = [];
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('dispatches a command and reports its exit code', async () => {
    const pattern = write('plain.json', { events: [{ time: 1, key: 'a', action: 'press' }] });
    await run('verify', pattern);
    expect(out).toEqual([`OK ${pattern}: 1 actions, 0s, tolerance 100ms`]);
    expect(codes).toEqual([0]);
  });

  test('applies the configuration file', async () => {
    const pattern = write('plain.json', { events: [{ time: 1, key: 'a', action: 'press' }] });
    const config = write('dojo.json', { default_tolerance_ms: 40 });
    await run('--config', config, 'verify', pattern);
    expect(out).toEqual([`OK ${pattern}: 1 actions, 0s, tolerance 40ms`]);
  });

  test('an invalid configuration exits 2 before the command runs', async () => {
    const pattern = write('plain.json', { events: [] });
    const config = write('dojo.json', { colour: 'red' });
    await run('-c', config, 'verify', pattern);
    expect(out).toEqual([]);
    expect(err).toEqual(['Failed to load configuration:', "  - unknown option 'colour'"]);
    expect(codes).toEqual([2]);
  });

  test('passes command options through', async () => {
    const pattern = write('drill.json', {
      events: [
        { time: 1, key: 'a', action: 'press' },
        { time: 2, key: 'a', action: 'release' },
      ],
    });
    await run('upcoming', pattern, '--at', '0.5', '--lookahead', '1');
    expect(out).toEqual(['+0.500s  press    a']);
    expect(codes).toEqual([0]);
  });

  test('list takes the directory argument', async () => {
    write('drill.json', { events: [] });
    await run('list', dir);
    expect(out).toEqual(['drill.json']);
  });
});
