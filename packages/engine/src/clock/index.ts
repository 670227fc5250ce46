export { ClockAdapter, frameToSeconds } from './clockAdapter.js';
export type { ClockSample, ClockRegressionEvent, ClockAdapterOptions } from './clockAdapter.js';
