import { FileStorage, PatternStore } from '@dojo-trainer/engine';
import { CliContext, reportError } from '../context.js';

/** List the pattern and recording documents in a directory. */
export function listCommand(ctx: CliContext, dir = '.'): number {
  try {
    const ids = new PatternStore(new FileStorage(dir)).list();
    if (ids.length === 0) ctx.stdout(`No patterns or recordings in ${dir}`);
    for (const id of ids) ctx.stdout(id);
    return 0;
  } catch (err) {
    return reportError(ctx, `Failed to list ${dir}`, err);
  }
}
