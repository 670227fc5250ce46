import { pairHolds, Pattern, Recording, serializePattern, serializeRecording } from '@dojo-trainer/engine';
import { CliContext, openFile, reportError } from '../context.js';

export interface InspectOptions {
  /** Read the file as a recording instead of a pattern. */
  recording?: boolean;
  /** Print the canonical JSON document. */
  json?: boolean;
}

function describeHolds(events: Recording['events']): string[] {
  return pairHolds(events).map(h => {
    const end = h.releaseTime === null ? '(held)' : `${h.releaseTime.toFixed(3)}s (${((h.releaseTime - h.pressTime) * 1000).toFixed(1)}ms)`;
    return `  ${h.key} ${h.pressTime.toFixed(3)}s -> ${end}`;
  });
}

function keysOf(events: Recording['events']): string {
  return [...new Set(events.map(e => e.key))].sort().join(', ') || '-';
}

function describePattern(p: Pattern): string[] {
  const presses = p.actions.filter(a => a.action === 'press').length;
  return [
    `Pattern: ${p.name}`,
    `Source: ${p.sourceId || '-'}`,
    `Created: ${p.createdAt || '-'}`,
    `Duration: ${p.totalDuration}s`,
    `Tolerance: ${p.defaultToleranceMs}ms`,
    `Actions: ${p.actions.length} (${presses} press, ${p.actions.length - presses} release)`,
    `Keys: ${keysOf(p.actions)}`,
    'Holds:',
    ...describeHolds(p.actions),
  ];
}

function describeRecording(r: Recording): string[] {
  const lines = [
    `Recording of: ${r.sourceId || '-'}`,
    `Created: ${r.createdAt || '-'}`,
    `Duration: ${r.totalDuration}s`,
    `Events: ${r.events.length}`,
    `Keys: ${keysOf(r.events)}`,
    `Anomalies: ${r.anomalies.length}`,
  ];
  for (const a of r.anomalies) lines.push(`  ${a.kind} ${a.key} at ${a.time.toFixed(3)}s`);
  lines.push('Holds:', ...describeHolds(r.events));
  return lines;
}

/** Print the structure of a pattern or a recording. */
export function inspectCommand(ctx: CliContext, file: string, opts: InspectOptions = {}): number {
  try {
    const { store, id } = openFile(file, ctx.config);
    if (opts.recording) {
      const rec = store.loadRecording(id);
      if (opts.json) ctx.stdout(JSON.stringify(serializeRecording(rec), null, 2));
      else describeRecording(rec).forEach(line => ctx.stdout(line));
    } else {
      const pattern = store.load(id);
      if (opts.json) ctx.stdout(JSON.stringify(serializePattern(pattern), null, 2));
      else describePattern(pattern).forEach(line => ctx.stdout(line));
    }
    return 0;
  } catch (err) {
    return reportError(ctx, `Failed to inspect ${file}`, err);
  }
}
