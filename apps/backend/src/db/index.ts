import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import config from '../config';
import logger from '../utils/logger';

const pool = new Pool({
  connectionString: config.database.url,
  max: config.database.poolMax,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 2000,
});

pool.on('error', (err) => {
  logger.error('Unexpected error on idle database client', err);
});

export const query = async <R extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<QueryResult<R>> => {
  const start = Date.now();
  const res = await pool.query<R>(text, params);
  const duration = Date.now() - start;

  if (duration > 100) {
    logger.warn('Slow query', { text, duration, rows: res.rowCount });
  }

  return res;
};

export const withTransaction = async <T>(work: (client: PoolClient) => Promise<T>): Promise<T> => {
  const client = await pool.connect();
  const timeout = setTimeout(() => {
    logger.error('A client has been checked out for too long!');
  }, 5000);

  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    clearTimeout(timeout);
    client.release();
  }
};

export const closePool = async (): Promise<void> => {
  await pool.end();
};

export default {
  query,
  withTransaction,
  closePool,
  pool,
};
