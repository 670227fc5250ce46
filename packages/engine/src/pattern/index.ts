export {
  parsePattern,
  serializePattern,
  parseRecording,
  serializeRecording,
  patternFromRecording,
} from './jsonFormat.js';
export type {
  EventRecord,
  PatternFile,
  RecordingFile,
  ParseOptions,
  PatternFromRecordingOptions,
} from './jsonFormat.js';
export { parsePatternText, formatPatternText } from './text/index.js';
export { PatternStore, FileStorage, MemoryStorage, formatForId, recordingId } from './store.js';
export type { TextStorage, PatternFormat, PatternStoreOptions } from './store.js';
export { upcomingActions } from './upcoming.js';
export type { UpcomingAction } from './upcoming.js';
