export { EventRecorder } from './eventRecorder.js';
export type { EventRecorderOptions, RecordOutcome } from './eventRecorder.js';
export { normalizeKey } from './keys.js';
export { enforcePairing, pairHolds, sortByTime } from './pairing.js';
export type { HeldKey, PairingResult } from './pairing.js';
