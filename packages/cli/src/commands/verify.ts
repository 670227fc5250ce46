import { CliContext, openFile, reportError } from '../context.js';

/** Load a pattern and report whether it is valid. */
export function verifyCommand(ctx: CliContext, file: string): number {
  try {
    const { store, id } = openFile(file, ctx.config);
    const pattern = store.load(id);
    ctx.stdout(
      `OK ${file}: ${pattern.actions.length} actions, ${pattern.totalDuration}s, tolerance ${pattern.defaultToleranceMs}ms`
    );
    return 0;
  } catch (err) {
    return reportError(ctx, `Validation failed for ${file}`, err);
  }
}
