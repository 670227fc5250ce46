export { MatchingEngine, matchEvents, gradeHit } from './matchingEngine.js';
export type { MatchingOptions, MatchFeedback } from './matchingEngine.js';
