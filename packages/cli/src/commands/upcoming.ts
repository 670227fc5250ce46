import { upcomingActions } from '@dojo-trainer/engine';
import { CliContext, openFile, parseNumberOption, reportError } from '../context.js';

export interface UpcomingOptions {
  at?: string;
  lookahead?: string;
}

/** Print the actions due shortly after a playback position. */
export function upcomingCommand(ctx: CliContext, file: string, opts: UpcomingOptions = {}): number {
  try {
    const at = parseNumberOption('--at', opts.at) ?? 0;
    const lookahead = parseNumberOption('--lookahead', opts.lookahead) ?? 5;
    const { store, id } = openFile(file, ctx.config);
    const due = upcomingActions(store.load(id), at, lookahead);
    if (due.length === 0) {
      ctx.stdout(`Nothing due in the ${lookahead}s after ${at}s`);
      return 0;
    }
    for (const { offset, action } of due) {
      ctx.stdout(`+${offset.toFixed(3)}s  ${action.action.padEnd(7)}  ${action.key}`);
    }
    return 0;
  } catch (err) {
    return reportError(ctx, `Failed to read ${file}`, err);
  }
}
