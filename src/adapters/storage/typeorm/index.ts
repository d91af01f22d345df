/**
 * TypeORM Storage Adapter (SQLite via better-sqlite3, or PostgreSQL)
 */

export { TypeORMStorageAdapter } from './typeorm-storage.adapter';
export {
  createDataSource,
  createTypeORMConfig,
  parseDatabaseUrl,
  registerUnicodeLower,
} from './typeorm.config';
export type { DatabaseTarget, SqliteFunctionRegistry } from './typeorm.config';
export * from './entities';
