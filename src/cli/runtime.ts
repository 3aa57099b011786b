/**
 * Command Runtime
 *
 * Creates the storage clients once per command and wires them into the
 * repositories and services. Every command closes its runtime when done.
 *
 * @module cli/runtime
 */

import type Database from 'better-sqlite3';
import type { Pool } from 'pg';
import type { Logger } from 'pino';
import { requireDatabaseUrl } from '../config.js';
import type { Config } from '../config.js';
import type { SqlExecutor } from '../db/executor.js';
import { createPgExecutor, createPgPool } from '../db/pg-executor.js';
import { createSqliteExecutor, openCacheDatabase } from '../db/sqlite-executor.js';
import { DocumentReconciler } from '../documents/document-reconciler.js';
import { SqliteCacheRepository } from '../repositories/cache-repository.js';
import type { CacheRepository } from '../repositories/cache-repository.js';
import { PgDocumentRepository } from '../repositories/document-repository.js';
import { PgFinancialRepository } from '../repositories/financial-repository.js';
import { PgProcessRepository } from '../repositories/process-repository.js';
import { PgSourceRepository } from '../repositories/source-repository.js';

export interface Runtime {
  canonical: SqlExecutor;
  documents: PgDocumentRepository;
  processes: PgProcessRepository;
  financials: PgFinancialRepository;
  source: PgSourceRepository;
  cache: CacheRepository | null;
  reconciler: DocumentReconciler;
  close(): Promise<void>;
}

export interface RuntimeOptions {
  /** Open the local cache store; a missing file fails at startup */
  cache: boolean;
}

export function openRuntime(config: Config, logger: Logger, options: RuntimeOptions): Runtime {
  const canonicalUrl = requireDatabaseUrl(config);
  const sourceUrl = config.database.sourceUrl ?? canonicalUrl;

  const pools: Pool[] = [];
  const canonicalPool = createPgPool({
    connectionString: canonicalUrl,
    max: config.database.poolMax,
    statementTimeoutMs: config.database.statementTimeoutMs,
  });
  pools.push(canonicalPool);

  let sourcePool = canonicalPool;
  if (sourceUrl !== canonicalUrl) {
    sourcePool = createPgPool({
      connectionString: sourceUrl,
      max: config.database.poolMax,
      statementTimeoutMs: config.database.statementTimeoutMs,
      applicationName: 'customs-sync-source',
    });
    pools.push(sourcePool);
  }

  let cacheDb: Database.Database | null = null;
  let cache: CacheRepository | null = null;
  if (options.cache) {
    cacheDb = openCacheDatabase(config.cache.path);
    cache = new SqliteCacheRepository({ executor: createSqliteExecutor(cacheDb, logger), logger });
  }

  const canonical = createPgExecutor(canonicalPool, logger);
  const documents = new PgDocumentRepository({ executor: canonical, logger });
  const reconcilerConfig = cache
    ? { repository: documents, logger, cache }
    : { repository: documents, logger };

  return {
    canonical,
    documents,
    processes: new PgProcessRepository({ executor: canonical, logger }),
    financials: new PgFinancialRepository({ executor: canonical }),
    source: new PgSourceRepository({ executor: createPgExecutor(sourcePool, logger), logger }),
    cache,
    reconciler: new DocumentReconciler(reconcilerConfig),
    async close(): Promise<void> {
      cacheDb?.close();
      await Promise.all(pools.map((pool) => pool.end()));
    },
  };
}
