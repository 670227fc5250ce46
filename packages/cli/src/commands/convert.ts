import { patternFromRecording } from '@dojo-trainer/engine';
import { CliContext, openFile, reportError } from '../context.js';

export interface ConvertOptions {
  /** The input is a recording to promote to a pattern. */
  fromRecording?: boolean;
  /** Pattern name when promoting a recording. */
  name?: string;
}

/** Rewrite a pattern in the format given by the output extension (.json or .pat). */
export function convertCommand(ctx: CliContext, input: string, output: string, opts: ConvertOptions = {}): number {
  try {
    const src = openFile(input, ctx.config);
    const pattern = opts.fromRecording
      ? patternFromRecording(src.store.loadRecording(src.id), {
          name: opts.name,
          defaultToleranceMs: ctx.config.defaultToleranceMs,
        })
      : src.store.load(src.id);
    const dest = openFile(output, ctx.config);
    dest.store.save(pattern, dest.id);
    ctx.stdout(`Wrote ${output} (${pattern.actions.length} actions)`);
    return 0;
  } catch (err) {
    return reportError(ctx, `Failed to convert ${input}`, err);
  }
}
