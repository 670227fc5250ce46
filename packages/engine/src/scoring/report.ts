import { ActionFeedback, ScoreReport } from './scoringEngine.js';

export function formatDelta(ms: number): string {
  return `${ms > 0 ? '+' : ''}${ms.toFixed(1)}ms`;
}

function formatAction(f: ActionFeedback): string {
  const label = f.label.toUpperCase().replace('-', '_');
  const detail = f.result.kind === 'hit' ? `${formatDelta(f.result.deltaMs)} (${f.result.grade})` : '-';
  const line = `  ${f.action.time.toFixed(3)}s  ${f.action.action.padEnd(7)}  ${f.action.key.padEnd(6)}  ${label.padEnd(9)}  ${detail}`;
  return line.trimEnd();
}

/** Human-readable lines for a terminal or log. */
export function formatReport(report: ScoreReport, title?: string): string[] {
  const lines: string[] = [];
  if (title) lines.push(`Pattern: ${title}`);
  lines.push(`Score: ${report.totalScore.toFixed(1)}/100`);
  lines.push(`Hits: ${report.hits}  Misses: ${report.misses}  Extras: ${report.extras}  Early: ${report.early}  Late: ${report.late}`);
  const mean = report.meanAbsDeltaMs === null ? '-' : `${report.meanAbsDeltaMs.toFixed(1)}ms`;
  lines.push(`Points: ${report.points}  Max combo: ${report.maxCombo}  Mean |delta|: ${mean}`);
  for (const f of report.perAction) lines.push(formatAction(f));
  for (const w of report.warnings) lines.push(`warning: ${w}`);
  return lines;
}
