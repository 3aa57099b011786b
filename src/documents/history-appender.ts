/**
 * History Appender
 *
 * Appends one history row per detected change. Inserts are independent: a
 * failed row is logged and the next change is still attempted, except when
 * storage is unavailable, which ends the batch.
 *
 * @module documents/history-appender
 */

import type { Logger } from 'pino';
import type { DocumentRepository } from '../repositories/document-repository.js';
import { StorageUnavailableError } from '../utils/errors.js';
import type {
  CanonicalFields,
  Change,
  DocumentIdentity,
  RawPayload,
  RecordedChange,
} from './types.js';

export const MAX_VALUE_LENGTH = 500;
export const MAX_DESCRIPTION_LENGTH = 255;
export const SYSTEM_ACTOR = 'SYSTEM';

export interface HistoryContext {
  identity: DocumentIdentity;
  fields: CanonicalFields;
  rawPayload: RawPayload;
  source: string;
  apiEndpoint: string | null;
  processReference: string | null;
}

export function truncate(value: string, max: number): string {
  return value.length > max ? value.slice(0, max) : value;
}

/**
 * `status changed from 'A' to 'B'`; an absent previous value reads `null`
 */
export function describeChange(change: Change): string {
  const previous = change.previousValue === null ? 'null' : `'${change.previousValue}'`;
  return truncate(
    `${change.field} changed from ${previous} to '${change.newValue}'`,
    MAX_DESCRIPTION_LENGTH
  );
}

export class HistoryAppender {
  private readonly repository: DocumentRepository;
  private readonly log: Logger;

  constructor(config: { repository: DocumentRepository; logger: Logger }) {
    this.repository = config.repository;
    this.log = config.logger.child({ component: 'history-appender' });
  }

  /**
   * Record every change. Never throws; returns the changes that were stored.
   */
  async append(changes: readonly Change[], context: HistoryContext): Promise<RecordedChange[]> {
    if (changes.length === 0) {
      return [];
    }

    const { identity } = context;
    let documentId: number | null = null;
    try {
      documentId = await this.repository.findLatestSnapshotId(identity.number, identity.kind);
    } catch (error) {
      if (error instanceof StorageUnavailableError) {
        this.log.error({ number: identity.number, kind: identity.kind }, 'Storage unavailable, history not recorded');
        return [];
      }
      this.log.warn(
        { number: identity.number, kind: identity.kind, error: error instanceof Error ? error.message : String(error) },
        'Snapshot id lookup failed, recording history without it'
      );
    }

    const recorded: RecordedChange[] = [];

    for (const change of changes) {
      const previousValue = change.previousValue === null ? null : truncate(change.previousValue, MAX_VALUE_LENGTH);
      const newValue = truncate(change.newValue, MAX_VALUE_LENGTH);

      try {
        const historyId = await this.repository.insertHistory({
          documentId,
          identity,
          processReference: context.processReference,
          eventAt: change.detectedAt,
          eventKind: change.eventKind,
          description: describeChange(change),
          field: change.field,
          previousValue,
          newValue,
          fields: context.fields,
          dataSource: context.source,
          apiEndpoint: context.apiEndpoint,
          rawPayload: context.rawPayload,
          actor: SYSTEM_ACTOR,
        });

        recorded.push({
          historyId,
          number: identity.number,
          kind: identity.kind,
          eventKind: change.eventKind,
          field: change.field,
          previous: previousValue,
          new: newValue,
        });
      } catch (error) {
        if (error instanceof StorageUnavailableError) {
          this.log.error(
            { number: identity.number, kind: identity.kind, recorded: recorded.length },
            'Storage unavailable, remaining history changes dropped'
          );
          break;
        }
        this.log.error(
          {
            number: identity.number,
            kind: identity.kind,
            field: change.field,
            error: error instanceof Error ? error.message : String(error),
          },
          'Failed to record history change'
        );
      }
    }

    if (recorded.length > 0) {
      this.log.info(
        { number: identity.number, kind: identity.kind, changes: recorded.length },
        'History changes recorded'
      );
    }

    return recorded;
  }
}
