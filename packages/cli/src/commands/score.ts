import { formatReport, matchEvents, parsePattern, Pattern, score, serializePattern } from '@dojo-trainer/engine';
import { CliContext, openFile, parseNumberOption, reportError } from '../context.js';

export interface ScoreOptions {
  json?: boolean;
  /** Overrides the pattern's default tolerance, in ms. */
  tolerance?: string;
  /** Overrides the configured penalty per extra input. */
  penalty?: string;
}

function withDefaultTolerance(pattern: Pattern, toleranceMs: number): Pattern {
  return parsePattern({ ...serializePattern(pattern), default_tolerance_ms: toleranceMs });
}

/** Match a recording against a pattern and print the score report. */
export function scoreCommand(ctx: CliContext, patternFile: string, recordingFile: string, opts: ScoreOptions = {}): number {
  try {
    const tolerance = parseNumberOption('--tolerance', opts.tolerance);
    const penalty = parseNumberOption('--penalty', opts.penalty) ?? ctx.config.penaltyPerExtra;

    const p = openFile(patternFile, ctx.config);
    let pattern = p.store.load(p.id);
    if (tolerance !== undefined) pattern = withDefaultTolerance(pattern, tolerance);
    const r = openFile(recordingFile, ctx.config);
    const recording = r.store.loadRecording(r.id);

    const outcome = matchEvents(pattern, recording.events, {
      keyRepeatPolicy: ctx.config.keyRepeatPolicy,
      gradeRatios: ctx.config.gradeRatios,
    });
    const report = score(pattern, outcome, { penaltyPerExtra: penalty });

    if (opts.json) ctx.stdout(JSON.stringify(report, null, 2));
    else formatReport(report, pattern.name).forEach(line => ctx.stdout(line));
    return 0;
  } catch (err) {
    return reportError(ctx, `Failed to score ${recordingFile}`, err);
  }
}
