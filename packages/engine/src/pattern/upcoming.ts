import { LogicalTime, Pattern, PatternAction } from '../model.js';

export interface UpcomingAction {
  /** Seconds from `now` until the action is due. */
  offset: number;
  action: PatternAction;
}

/**
 * Actions due in the half-open window (now, now + lookahead], in time order.
 * Drives the "coming up next" lane of a display.
 */
export function upcomingActions(pattern: Pattern, now: LogicalTime, lookahead = 5): UpcomingAction[] {
  const out: UpcomingAction[] = [];
  const horizon = now + lookahead;
  for (const action of pattern.actions) {
    if (action.time > horizon) break;
    if (action.time > now) out.push({ offset: action.time - now, action });
  }
  return out;
}
