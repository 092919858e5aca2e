/**
 * Error types raised by the practice engine and its collaborators.
 *
 * Per-event anomalies never throw; they are recorded as mismatches.
 */

/**
 * Configuration error. Raised before any Round starts.
 */
export class PracticeConfigError extends Error {
  /** One line per problem, e.g. "enabledModes: at least one mode must be enabled" */
  readonly issues: string[];

  constructor(issues: string[] | string) {
    const list = Array.isArray(issues) ? issues : [issues];
    super(`Invalid practice configuration: ${list.join('; ')}`);
    this.name = 'PracticeConfigError';
    this.issues = list;
  }
}

/**
 * A note event source could not be opened or read.
 */
export class NoteSourceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NoteSourceError';
  }
}
