/**
 * Schema Healer
 *
 * Widens `status_code` on the canonical tables where older deployments
 * created it too narrow for the status text fallback. Runs at most once per
 * instance; failures are logged and never stop the caller.
 *
 * @module services/schema-healer
 */

import type { Logger } from 'pino';
import { queryRows } from '../db/executor.js';
import type { SqlExecutor } from '../db/executor.js';

export const STATUS_CODE_MIN_LENGTH = 50;

const HEALED_TABLES = ['customs_document', 'customs_document_history'] as const;

type ColumnLengthRow = {
  table_name: string;
  character_maximum_length: number | string | null;
};

export class SchemaHealer {
  private readonly executor: SqlExecutor;
  private readonly log: Logger;
  private done = false;

  constructor(config: { executor: SqlExecutor; logger: Logger }) {
    this.executor = config.executor;
    this.log = config.logger.child({ component: 'schema-healer' });
  }

  /**
   * Returns the tables whose column was widened
   */
  async heal(): Promise<string[]> {
    if (this.done) {
      return [];
    }
    this.done = true;

    const widened: string[] = [];

    let rows: ColumnLengthRow[];
    try {
      rows = await queryRows<ColumnLengthRow>(this.executor, {
        text: `SELECT table_name, character_maximum_length
               FROM information_schema.columns
               WHERE column_name = 'status_code'
                 AND table_name IN ($1, $2)`,
        values: [...HEALED_TABLES],
      });
    } catch (error) {
      this.log.warn({ error: error instanceof Error ? error.message : String(error) }, 'Schema check failed');
      return widened;
    }

    for (const table of HEALED_TABLES) {
      const row = rows.find((candidate) => candidate.table_name === table);
      if (!row || row.character_maximum_length === null) {
        continue;
      }
      const length = Number(row.character_maximum_length);
      if (length >= STATUS_CODE_MIN_LENGTH) {
        continue;
      }

      try {
        await queryRows(this.executor, {
          text: `ALTER TABLE ${table} ALTER COLUMN status_code TYPE VARCHAR(${STATUS_CODE_MIN_LENGTH})`,
        });
        widened.push(table);
        this.log.info({ table, from: length, to: STATUS_CODE_MIN_LENGTH }, 'Widened status_code column');
      } catch (error) {
        this.log.warn(
          { table, error: error instanceof Error ? error.message : String(error) },
          'Failed to widen status_code column'
        );
      }
    }

    return widened;
  }
}
