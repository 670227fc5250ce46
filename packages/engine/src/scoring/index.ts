export { score, GRADE_POINTS, EMPTY_PATTERN_WARNING } from './scoringEngine.js';
export type { ScoreReport, ScoringOptions, ActionFeedback } from './scoringEngine.js';
export { formatReport, formatDelta } from './report.js';
