import { Pool, QueryResult, QueryResultRow } from 'pg';
import { config } from './index';

/**
 * Minimal query surface shared by pg.Pool and pg.PoolClient.
 * Repositories depend on this instead of the pool itself.
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<R>>;
}

export const pool = new Pool({
  connectionString: config.databaseUrl,
  max: 10,
  idleTimeoutMillis: 30000,
});

pool.on('error', (err) => {
  console.error('Unexpected PostgreSQL pool error:', err);
});

// Vector index lives in the same database unless VECTOR_DATABASE_URL points elsewhere
export const vectorPool =
  config.vector.databaseUrl === config.databaseUrl
    ? pool
    : new Pool({ connectionString: config.vector.databaseUrl, max: 5 });

export default pool;
