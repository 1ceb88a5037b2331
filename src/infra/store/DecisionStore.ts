/**
 * Decision Store — the authoritative, read-only list of decision records
 * for one session.
 *
 * Constructed explicitly and passed around; independent instances never
 * share state.
 */

import type { DecisionRecord } from '../../core/models/decision.js';
import { parseDecisionRecords } from '../../core/decisions/validate.js';
import { getErrorMessage, createLogger } from '../../shared/utils/index.js';
import { readDecisionSource, toRawEntries } from './source-reader.js';

const log = createLogger('decision-store');

export type DecisionSource =
  | { readonly type: 'file'; readonly path: string }
  | { readonly type: 'records'; readonly records: unknown; readonly label?: string };

export function describeSource(source: DecisionSource): string {
  return source.type === 'file' ? source.path : (source.label ?? 'inline records');
}

export class DecisionStore {
  private records: readonly DecisionRecord[] | null = null;

  constructor(private readonly source: DecisionSource) {}

  get sourceDescription(): string {
    return describeSource(this.source);
  }

  get isLoaded(): boolean {
    return this.records !== null;
  }

  /** Number of loaded records; 0 until load() succeeds */
  get size(): number {
    return this.records?.length ?? 0;
  }

  /**
   * Read and validate the source once. Later calls return the same
   * frozen sequence.
   *
   * @throws LoadError when the source is unreadable or malformed
   * @throws InvalidRecordError when a record fails validation
   */
  load(): readonly DecisionRecord[] {
    if (this.records) return this.records;

    const description = describeSource(this.source);
    try {
      const raws = this.source.type === 'file'
        ? readDecisionSource(this.source.path)
        : toRawEntries(description, this.source.records);
      this.records = parseDecisionRecords(raws);
    } catch (err) {
      log.debug('Decision load failed', { source: description, error: getErrorMessage(err) });
      throw err;
    }

    log.info('Decisions loaded', { source: description, count: this.records.length });
    return this.records;
  }

  /** Full sequence in insertion order; loads on first access */
  all(): readonly DecisionRecord[] {
    return this.records ?? this.load();
  }
}
