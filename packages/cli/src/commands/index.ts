export { verifyCommand } from './verify.js';
export { inspectCommand } from './inspect.js';
export type { InspectOptions } from './inspect.js';
export { convertCommand } from './convert.js';
export type { ConvertOptions } from './convert.js';
export { listCommand } from './list.js';
export { upcomingCommand } from './upcoming.js';
export type { UpcomingOptions } from './upcoming.js';
export { scoreCommand } from './score.js';
export type { ScoreOptions } from './score.js';
export { sessionCommand, parseTimeline } from './session.js';
export type { SessionOptions, Timeline } from './session.js';
