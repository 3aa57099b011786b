/**
 * customs-document-sync
 *
 * Library entry point. The `customs-sync` binary lives in ./cli.
 *
 * @module customs-document-sync
 */

export * from './config.js';
export * from './utils/errors.js';
export * from './utils/logger.js';

export * from './db/executor.js';
export * from './db/pg-executor.js';
export * from './db/sqlite-executor.js';
export * from './db/migrate.js';

export * from './documents/types.js';
export * from './documents/normalize.js';
export * from './documents/field-aliases.js';
export * from './documents/field-extractor.js';
export * from './documents/version-resolver.js';
export * from './documents/change-detector.js';
export * from './documents/history-appender.js';
export * from './documents/snapshot-upserter.js';
export * from './documents/mappers.js';
export * from './documents/document-reconciler.js';

export * from './repositories/source-repository.js';
export * from './repositories/document-repository.js';
export * from './repositories/cache-repository.js';
export * from './repositories/process-repository.js';
export * from './repositories/financial-repository.js';

export * from './services/existence-checker.js';
export * from './services/backfill-service.js';
export * from './services/schema-healer.js';
export * from './services/financial-aggregate-service.js';
export * from './services/process-reconciliation-service.js';
export * from './services/gap-fill-service.js';
