import {
  Pool,
  type PoolConfig,
  type QueryResultRow,
} from 'pg';

export interface DbSettings {
  databaseUrl: string;
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  ssl: boolean;
}

export interface Queryable {
  query<T extends QueryResultRow>(text: string, params?: unknown[]): Promise<T[]>;
}

export interface Db extends Queryable {
  close(): Promise<void>;
}

function buildPoolConfig(settings: DbSettings): PoolConfig {
  if (settings.databaseUrl) {
    return {
      connectionString: settings.databaseUrl,
      ssl: settings.ssl ? { rejectUnauthorized: false } : undefined,
    };
  }

  if (settings.host && settings.user && settings.database) {
    return {
      host: settings.host,
      port: settings.port,
      user: settings.user,
      password: settings.password || undefined,
      database: settings.database,
      ssl: settings.ssl ? { rejectUnauthorized: false } : undefined,
    };
  }

  throw new Error('DATABASE_NOT_CONFIGURED');
}

export function createDb(settings: DbSettings): Db {
  const pool = new Pool(buildPoolConfig(settings));

  return {
    async query<T extends QueryResultRow>(
      text: string,
      params: unknown[] = [],
    ): Promise<T[]> {
      const result = await pool.query<T>(text, params);
      return result.rows;
    },

    async close(): Promise<void> {
      await pool.end();
    },
  };
}
