/**
 * Existence Checker
 *
 * Batched, cached lookup of which document numbers already have a canonical
 * snapshot. The answer is tri-state: a batch that still times out after its
 * retries leaves its numbers UNKNOWN rather than guessing either way.
 *
 * @module services/existence-checker
 */

import type { Logger } from 'pino';
import type { DocumentKind } from '../documents/types.js';
import type { DocumentRepository } from '../repositories/document-repository.js';
import { withRetry } from '../utils/errors.js';
import type { RetryConfig } from '../utils/errors.js';

export type Existence = 'PRESENT' | 'ABSENT' | 'UNKNOWN';

export interface ExistenceCheckerConfig {
  repository: DocumentRepository;
  logger: Logger;
  /** Numbers per round-trip */
  batchSize?: number;
  retry?: Partial<RetryConfig>;
}

const DEFAULT_BATCH_SIZE = 500;

function cacheKey(kind: DocumentKind, number: string): string {
  return `${kind}:${number}`;
}

export class ExistenceChecker {
  private readonly repository: DocumentRepository;
  private readonly log: Logger;
  private readonly batchSize: number;
  private readonly retry: Partial<RetryConfig>;
  private readonly known = new Map<string, Existence>();

  constructor(config: ExistenceCheckerConfig) {
    this.repository = config.repository;
    this.log = config.logger.child({ component: 'existence-checker' });
    this.batchSize = Math.max(1, config.batchSize ?? DEFAULT_BATCH_SIZE);
    this.retry = { ...config.retry };
  }

  /**
   * Resolve every number not yet known, one round-trip per batch
   */
  async prefetch(kind: DocumentKind, numbers: readonly string[]): Promise<void> {
    const pending = [...new Set(numbers)].filter((number) => !this.known.has(cacheKey(kind, number)));

    for (let offset = 0; offset < pending.length; offset += this.batchSize) {
      const batch = pending.slice(offset, offset + this.batchSize);
      const results = await this.lookup(kind, batch);
      for (const [number, existence] of results) {
        this.known.set(cacheKey(kind, number), existence);
      }
    }
  }

  /**
   * Existence of one number, from the cache when already resolved
   */
  async check(kind: DocumentKind, number: string): Promise<Existence> {
    const cached = this.known.get(cacheKey(kind, number));
    if (cached !== undefined) {
      return cached;
    }
    return this.recheck(kind, number);
  }

  /**
   * Query again, ignoring the cache
   */
  async recheck(kind: DocumentKind, number: string): Promise<Existence> {
    const results = await this.lookup(kind, [number]);
    const existence = results.get(number) ?? 'UNKNOWN';
    this.known.set(cacheKey(kind, number), existence);
    return existence;
  }

  markPresent(kind: DocumentKind, number: string): void {
    this.known.set(cacheKey(kind, number), 'PRESENT');
  }

  private async lookup(kind: DocumentKind, batch: readonly string[]): Promise<Map<string, Existence>> {
    const results = new Map<string, Existence>();
    try {
      const present = await withRetry(
        () => this.repository.findExistingNumbers(kind, batch),
        this.retry,
        `existence check (${kind}, ${batch.length} numbers)`
      );
      for (const number of batch) {
        results.set(number, present.has(number) ? 'PRESENT' : 'ABSENT');
      }
    } catch (error) {
      this.log.warn(
        { kind, count: batch.length, error: error instanceof Error ? error.message : String(error) },
        'Existence check failed, numbers marked unknown'
      );
      for (const number of batch) {
        results.set(number, 'UNKNOWN');
      }
    }
    return results;
  }
}
