import * as fs from 'fs';
import * as path from 'path';
import { DataSource, DataSourceOptions } from 'typeorm';
import { MessageEntity } from './entities';

const SQLITE_PREFIX = 'sqlite:///';
const SQLITE_MEMORY_URLS = ['sqlite::memory:', 'sqlite:///:memory:'];

/**
 * Parsed form of a DATABASE_URL
 */
export type DatabaseTarget =
  | { type: 'sqlite'; database: string }
  | { type: 'postgres'; url: string };

/**
 * Parse a DATABASE_URL.
 *
 * - `sqlite::memory:` for an in-process database
 * - `sqlite:///<path>` for a file (`sqlite:////abs/path` is absolute)
 * - `postgres://…` or `postgresql://…`
 */
export function parseDatabaseUrl(databaseUrl: string): DatabaseTarget {
  const url = databaseUrl.trim();

  if (SQLITE_MEMORY_URLS.includes(url)) {
    return { type: 'sqlite', database: ':memory:' };
  }

  if (url.startsWith(SQLITE_PREFIX)) {
    const database = url.slice(SQLITE_PREFIX.length);
    if (database.length === 0) {
      throw new Error(`DATABASE_URL has no database path: ${databaseUrl}`);
    }
    return { type: 'sqlite', database };
  }

  if (url.startsWith('postgres://') || url.startsWith('postgresql://')) {
    return { type: 'postgres', url };
  }

  throw new Error(`Unsupported DATABASE_URL: ${databaseUrl}`);
}

/**
 * The part of a better-sqlite3 connection used to register SQL functions
 */
export interface SqliteFunctionRegistry {
  function(
    name: string,
    options: { deterministic: boolean },
    implementation: (value: unknown) => unknown,
  ): unknown;
}

/**
 * Replace SQLite's ASCII-only LOWER() with full Unicode case folding, so
 * `q` searches fold text the way PostgreSQL and the in-memory store do.
 */
export function registerUnicodeLower(db: SqliteFunctionRegistry): void {
  db.function('lower', { deterministic: true }, (value) =>
    typeof value === 'string' ? value.toLowerCase() : value,
  );
}

/**
 * TypeORM configuration for the message store
 */
export const createTypeORMConfig = (
  databaseUrl: string,
  options: { logging?: boolean } = {},
): DataSourceOptions => {
  const target = parseDatabaseUrl(databaseUrl);
  const common = {
    entities: [MessageEntity],
    // No migration tooling: the single table is created on startup
    synchronize: true,
    logging: options.logging ?? false,
  };

  switch (target.type) {
    case 'sqlite':
      return {
        ...common,
        type: 'better-sqlite3',
        database: target.database,
        prepareDatabase: registerUnicodeLower,
      };

    case 'postgres':
      return {
        ...common,
        type: 'postgres',
        url: target.url,
        extra: {
          max: 10,
          idleTimeoutMillis: 30000,
          connectionTimeoutMillis: 2000,
        },
      };
  }
};

/**
 * Create TypeORM DataSource
 */
export const createDataSource = (
  databaseUrl: string,
  options: { logging?: boolean } = {},
): DataSource => {
  const config = createTypeORMConfig(databaseUrl, options);

  if (config.type === 'better-sqlite3' && config.database !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(config.database)), {
      recursive: true,
    });
  }

  return new DataSource(config);
};
