/**
 * Errors that propagate to callers. Expected in-session deviations (orphan
 * releases, clock regressions, empty patterns) are data annotations instead
 * and never thrown.
 */

function formatProblems(what: string, problems: readonly string[], source?: string): string {
  const where = source ? ` (${source})` : '';
  return `${what}${where}:\n` + problems.map(p => ` - ${p}`).join('\n');
}

/** A pattern that fails its authoring invariants. Fatal to the load. */
export class MalformedPatternError extends Error {
  readonly problems: readonly string[];
  readonly source?: string;

  constructor(problems: readonly string[], source?: string) {
    super(formatProblems('Malformed pattern', problems, source));
    this.name = 'MalformedPatternError';
    this.problems = problems;
    this.source = source;
  }
}

/** A persisted recording that is not structurally valid. */
export class MalformedRecordingError extends Error {
  readonly problems: readonly string[];
  readonly source?: string;

  constructor(problems: readonly string[], source?: string) {
    super(formatProblems('Malformed recording', problems, source));
    this.name = 'MalformedRecordingError';
    this.problems = problems;
    this.source = source;
  }
}

export class ConfigError extends Error {
  readonly problems: readonly string[];

  constructor(problems: readonly string[]) {
    super(formatProblems('Invalid configuration', problems));
    this.name = 'ConfigError';
    this.problems = problems;
  }
}
