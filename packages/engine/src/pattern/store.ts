import { existsSync, mkdirSync, readdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname, extname, join, resolve } from 'path';
import { MalformedPatternError, MalformedRecordingError } from '../errors.js';
import { Pattern, Recording } from '../model.js';
import { createLogger } from '../util/logger.js';
import { parsePattern, parseRecording, ParseOptions, serializePattern, serializeRecording } from './jsonFormat.js';
import { formatPatternText, parsePatternText } from './text/index.js';

const log = createLogger('store');

/** Where pattern and recording documents live. Errors propagate to callers. */
export interface TextStorage {
  read(id: string): string;
  write(id: string, text: string): void;
  /** Ids of the stored documents, in any order. */
  list(): string[];
}

/** Documents are files under a base directory; ids are relative paths. */
export class FileStorage implements TextStorage {
  readonly baseDir: string;

  constructor(baseDir = '.') {
    this.baseDir = resolve(baseDir);
  }

  read(id: string): string {
    return readFileSync(join(this.baseDir, id), 'utf8');
  }

  write(id: string, text: string): void {
    const path = join(this.baseDir, id);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, text, 'utf8');
  }

  list(): string[] {
    if (!existsSync(this.baseDir)) return [];
    return readdirSync(this.baseDir);
  }
}

export class MemoryStorage implements TextStorage {
  private files = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [id, text] of Object.entries(initial)) this.files.set(id, text);
  }

  read(id: string): string {
    const text = this.files.get(id);
    if (text === undefined) throw new Error(`No such document: ${id}`);
    return text;
  }

  write(id: string, text: string): void {
    this.files.set(id, text);
  }

  list(): string[] {
    return [...this.files.keys()];
  }
}

export type PatternFormat = 'json' | 'text';

const TEXT_EXTENSIONS = ['.pat', '.dojo'];
const KNOWN_EXTENSIONS = ['.json', ...TEXT_EXTENSIONS];

export function formatForId(id: string): PatternFormat {
  return TEXT_EXTENSIONS.includes(extname(id).toLowerCase()) ? 'text' : 'json';
}

function parseJson(text: string, onError: (message: string) => Error): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw onError(`invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export interface PatternStoreOptions {
  /** Frame rate for frame-indexed documents. */
  fps?: number;
  /** Tolerance used when a document does not set one. */
  defaultToleranceMs?: number;
}

/**
 * Loads and saves patterns and recordings through a TextStorage, picking
 * the format from the id's extension (.json, or .pat/.dojo for text).
 */
export class PatternStore {
  constructor(private storage: TextStorage, private opts: PatternStoreOptions = {}) {}

  private parseOptions(id: string): ParseOptions {
    const base = extname(id) ? id.slice(0, -extname(id).length) : id;
    return {
      fps: this.opts.fps,
      defaultToleranceMs: this.opts.defaultToleranceMs,
      name: base.split(/[\\/]/).pop(),
      source: id,
    };
  }

  load(id: string): Pattern {
    const text = this.storage.read(id);
    const opts = this.parseOptions(id);
    const pattern = formatForId(id) === 'text'
      ? parsePatternText(text, opts)
      : parsePattern(parseJson(text, msg => new MalformedPatternError([msg], id)), opts);
    log.debug(`Loaded pattern '${pattern.name}' (${pattern.actions.length} actions) from ${id}`);
    return pattern;
  }

  save(pattern: Pattern, id: string): void {
    const text = formatForId(id) === 'text'
      ? formatPatternText(pattern)
      : JSON.stringify(serializePattern(pattern), null, 2) + '\n';
    this.storage.write(id, text);
    log.debug(`Saved pattern '${pattern.name}' to ${id}`);
  }

  loadRecording(id: string): Recording {
    const text = this.storage.read(id);
    return parseRecording(parseJson(text, msg => new MalformedRecordingError([msg], id)), this.parseOptions(id));
  }

  saveRecording(recording: Recording, id: string): void {
    this.storage.write(id, JSON.stringify(serializeRecording(recording), null, 2) + '\n');
    log.debug(`Saved recording with ${recording.events.length} events to ${id}`);
  }

  /** Stored pattern and recording documents, sorted by id. */
  list(): string[] {
    return this.storage
      .list()
      .filter(id => KNOWN_EXTENSIONS.includes(extname(id).toLowerCase()))
      .sort();
  }
}

/** Id for a new recording, stamped with the local date and time. */
export function recordingId(now: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const stamp = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `recording_${stamp}.json`;
}
