import { MalformedPatternError } from '../../errors.js';
import { Pattern } from '../../model.js';
import { parsePattern, ParseOptions } from '../jsonFormat.js';
import { lex } from './lexer.js';
import { parseCst } from './parser.js';
import { KEYWORDS } from './tokens.js';
import { transformPatternCst } from './transformer.js';

/**
 * Parse the `.pat` text format into a Pattern.
 *
 * ```
 * name "Opener"
 * tolerance 100
 * 1.000 press 1
 * 1.250 release 1 ~50
 * hold q 2.0 2.4
 * ```
 */
export function parsePatternText(text: string, opts: ParseOptions = {}): Pattern {
  const problems: string[] = [];

  const lexed = lex(text);
  for (const e of lexed.errors) {
    problems.push(`line ${e.line ?? '?'}, column ${e.column ?? '?'}: ${e.message}`);
  }
  if (problems.length > 0) throw new MalformedPatternError(problems, opts.source);

  const { cst, errors } = parseCst(lexed.tokens);
  for (const e of errors) {
    problems.push(`line ${e.token.startLine ?? '?'}: ${e.message}`);
  }
  if (problems.length > 0) throw new MalformedPatternError(problems, opts.source);

  const record = transformPatternCst(cst, problems);
  if (problems.length > 0) throw new MalformedPatternError(problems, opts.source);

  return parsePattern(record, opts);
}

const BARE_KEY = /^(?:[A-Za-z_][A-Za-z0-9_\-]*|\d+)$/;

function formatKey(key: string): string {
  return BARE_KEY.test(key) && !KEYWORDS.includes(key) ? key : JSON.stringify(key);
}

function formatTolerance(ms: number | undefined): string {
  return ms === undefined ? '' : ` ~${ms}`;
}

/** Inverse of parsePatternText. Every action is written on its own line. */
export function formatPatternText(pattern: Pattern): string {
  const lines: string[] = [
    `name ${JSON.stringify(pattern.name)}`,
    `source ${JSON.stringify(pattern.sourceId)}`,
    `created ${JSON.stringify(pattern.createdAt)}`,
    `duration ${pattern.totalDuration}`,
    `tolerance ${pattern.defaultToleranceMs}`,
    '',
  ];
  for (const a of pattern.actions) {
    lines.push(`${a.time} ${a.action} ${formatKey(a.key)}${formatTolerance(a.toleranceMs)}`);
  }
  return lines.join('\n') + '\n';
}
