export { TrainingSession } from './trainingSession.js';
export type { TrainingSessionOptions, SessionResult } from './trainingSession.js';
export { SessionQueue } from './queue.js';
export { EventBus } from './event-bus.js';
export type { DojoEvents, EventName } from './event-bus.js';
