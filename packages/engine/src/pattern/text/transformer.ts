import { CstElement, CstNode, IToken } from 'chevrotain';
import { EventRecord } from '../jsonFormat.js';

function isToken(el: CstElement): el is IToken {
  return 'image' in el;
}

function tokens(node: CstNode, label: string): IToken[] {
  return (node.children[label] ?? []).filter(isToken);
}

function nodes(node: CstNode, label: string): CstNode[] {
  return (node.children[label] ?? []).filter((el): el is CstNode => !isToken(el));
}

function token(node: CstNode, label: string): IToken | undefined {
  return tokens(node, label)[0];
}

function unquote(tok: IToken, problems: string[]): string {
  let value: unknown;
  try {
    value = JSON.parse(tok.image);
  } catch (err) {
    problems.push(`line ${tok.startLine ?? '?'}: invalid string literal ${tok.image} (${err instanceof Error ? err.message : String(err)})`);
    return '';
  }
  return typeof value === 'string' ? value : '';
}

function keyOf(node: CstNode, problems: string[]): string {
  const ref = nodes(node, 'keyRef')[0];
  const tok = ref ? token(ref, 'key') : undefined;
  if (!tok) return '';
  return tok.tokenType.name === 'StringLiteral' ? unquote(tok, problems) : tok.image;
}

function toleranceOf(node: CstNode): number | undefined {
  const override = nodes(node, 'toleranceOverride')[0];
  const tok = override ? token(override, 'ms') : undefined;
  return tok ? Number(tok.image) : undefined;
}

function eventRecord(time: number, key: string, action: 'press' | 'release', toleranceMs: number | undefined): EventRecord {
  const rec: EventRecord = { time, key, action };
  if (toleranceMs !== undefined) rec.tolerance_ms = toleranceMs;
  return rec;
}

const HEADER_FIELDS: Record<string, string> = {
  name: 'name',
  source: 'source_id',
  created: 'created_at',
  duration: 'total_duration',
  tolerance: 'default_tolerance_ms',
};

/**
 * Turn a pattern-file CST into the JSON record shape consumed by
 * parsePattern, so both formats share one validation path.
 */
export function transformPatternCst(cst: CstNode, problems: string[]): Record<string, unknown> {
  const record: Record<string, unknown> = {};
  const events: EventRecord[] = [];

  for (const stmt of nodes(cst, 'statement')) {
    const header = nodes(stmt, 'headerStmt')[0];
    if (header) {
      const directive = token(header, 'directive');
      if (!directive) continue;
      const field = HEADER_FIELDS[directive.image];
      if (record[field] !== undefined) {
        problems.push(`line ${directive.startLine ?? '?'}: duplicate '${directive.image}' directive`);
        continue;
      }
      const text = token(header, 'text');
      const num = token(header, 'number');
      if (text) record[field] = unquote(text, problems);
      else if (num) record[field] = Number(num.image);
      continue;
    }

    const action = nodes(stmt, 'actionStmt')[0];
    if (action) {
      const time = token(action, 'time');
      const kind = token(action, 'action');
      if (!time || !kind) continue;
      events.push(eventRecord(Number(time.image), keyOf(action, problems), kind.image === 'press' ? 'press' : 'release', toleranceOf(action)));
      continue;
    }

    const hold = nodes(stmt, 'holdStmt')[0];
    if (hold) {
      const start = token(hold, 'start');
      const end = token(hold, 'end');
      if (!start || !end) continue;
      const key = keyOf(hold, problems);
      const tol = toleranceOf(hold);
      const from = Number(start.image);
      const to = Number(end.image);
      if (to < from) {
        problems.push(`line ${start.startLine ?? '?'}: hold of '${key}' ends before it starts`);
        continue;
      }
      events.push(eventRecord(from, key, 'press', tol));
      events.push(eventRecord(to, key, 'release', tol));
    }
  }

  record.events = events;
  return record;
}
