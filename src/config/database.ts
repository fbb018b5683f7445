import { Pool, PoolClient, types } from 'pg';
import dotenv from 'dotenv';

dotenv.config();

// DATE columns stay `YYYY-MM-DD` strings; NUMERIC money columns become numbers.
types.setTypeParser(1082, (value: string) => value); // DATE
types.setTypeParser(1700, (value: string) => parseFloat(value)); // NUMERIC

const pool = new Pool({
  host: process.env.DB_HOST || 'localhost',
  port: parseInt(process.env.DB_PORT || '5432'),
  user: process.env.DB_USER || 'postgres',
  password: process.env.DB_PASSWORD || 'postgres',
  database: process.env.DB_NAME || 'hr_records',
});

pool.on('error', (err) => {
  console.error('Unexpected error on idle client', err);
  process.exit(-1);
});

/**
 * Run a callback on a dedicated client inside BEGIN/COMMIT, rolling back
 * when it throws.
 */
export async function withTransaction<T>(
  fn: (client: PoolClient) => Promise<T>,
  source: Pool = pool
): Promise<T> {
  const client = await source.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}

export default pool;
