import { readFileSync } from 'fs';
import { dirname, basename } from 'path';
import {
  ConfigError,
  configureLogging,
  DojoConfig,
  FileStorage,
  MalformedPatternError,
  MalformedRecordingError,
  PatternStore,
  resolveConfig,
} from '@dojo-trainer/engine';

/** Global flags shared by every command. */
export interface GlobalOptions {
  verbose?: boolean;
  debug?: boolean;
  config?: string;
}

/** What a command needs from its surroundings; tests swap the output sinks. */
export interface CliContext {
  config: DojoConfig;
  verbose: boolean;
  debug: boolean;
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

/** Read a JSON configuration file and merge it over the defaults. */
export function loadConfigFile(path: string): DojoConfig {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err) {
    if (err instanceof SyntaxError) throw new ConfigError([`${path}: ${err.message}`]);
    throw err;
  }
  return resolveConfig(data);
}

export function createContext(opts: GlobalOptions, sinks?: Pick<CliContext, 'stdout' | 'stderr'>): CliContext {
  if (opts.debug) configureLogging({ level: 'debug' });
  else if (opts.verbose) configureLogging({ level: 'info' });

  return {
    config: opts.config ? loadConfigFile(opts.config) : resolveConfig({}),
    verbose: opts.verbose === true,
    debug: opts.debug === true,
    stdout: sinks?.stdout ?? (line => console.log(line)),
    stderr: sinks?.stderr ?? (line => console.error(line)),
  };
}

/** A store rooted at the file's directory, and the file's id within it. */
export function openFile(path: string, config: DojoConfig, fps?: number): { store: PatternStore; id: string } {
  return {
    store: new PatternStore(new FileStorage(dirname(path)), { defaultToleranceMs: config.defaultToleranceMs, fps }),
    id: basename(path),
  };
}

/**
 * Print a failure and return the exit code: 2 for invalid input, 1 for
 * anything else (I/O, unexpected errors).
 */
export function reportError(ctx: Pick<CliContext, 'debug' | 'stderr'>, heading: string, err: unknown): number {
  if (err instanceof MalformedPatternError || err instanceof MalformedRecordingError || err instanceof ConfigError) {
    ctx.stderr(`${heading}:`);
    for (const p of err.problems) ctx.stderr(`  - ${p}`);
    if (ctx.debug && err.stack) ctx.stderr(err.stack);
    return 2;
  }
  if (err instanceof Error) {
    ctx.stderr(`${heading}: ${ctx.debug && err.stack ? err.stack : err.message}`);
  } else {
    ctx.stderr(`${heading}: ${String(err)}`);
  }
  return 1;
}

/** Parse a numeric flag, rejecting anything that is not a finite number >= 0. */
export function parseNumberOption(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n) || n < 0) {
    throw new ConfigError([`${name} must be a non-negative number, got '${value}'`]);
  }
  return n;
}
