import { Pool } from 'pg';
import type { BaseLogger } from 'pino';

export function createPool(connectionString: string, logger?: BaseLogger): Pool {
  const pool = new Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000
  });

  pool.on('error', (err: Error) => {
    logger?.error({ err }, 'Unexpected PG client error');
  });

  return pool;
}

export async function closePool(pool: Pool): Promise<void> {
  await pool.end();
}
