/**
 * Decision log error taxonomy.
 *
 * Both errors are terminal for the operation that raised them; the data is
 * static, so a retry cannot change the outcome.
 */

export class DecisionLogError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The decision source is unreadable, unparseable or not a list of records */
export class LoadError extends DecisionLogError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to load decisions from ${source}: ${message}`, options);
    this.source = source;
  }
}

export interface InvalidRecordDetails {
  recordId?: string;
  index?: number;
  issues: readonly string[];
}

/** A record violates a data-model invariant */
export class InvalidRecordError extends DecisionLogError {
  readonly recordId: string | undefined;
  readonly index: number | undefined;
  readonly issues: readonly string[];

  constructor(details: InvalidRecordDetails) {
    super(`Invalid decision record ${describeRecord(details)}: ${details.issues.join('; ')}`);
    this.recordId = details.recordId;
    this.index = details.index;
    this.issues = details.issues;
  }
}

function describeRecord(details: InvalidRecordDetails): string {
  if (details.recordId !== undefined && details.index !== undefined) {
    return `"${details.recordId}" (#${details.index})`;
  }
  if (details.recordId !== undefined) return `"${details.recordId}"`;
  if (details.index !== undefined) return `#${details.index}`;
  return '(unknown)';
}
