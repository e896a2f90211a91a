import { Pool, PoolClient } from 'pg';
import { logger } from '../utils/logger';

let pool: Pool | null = null;

const SSL_QUERY_PARAMS = ['sslmode', 'ssl', 'sslcert', 'sslkey', 'sslrootcert', 'sslcrl'];

export function getPool(): Pool {
  if (!pool) {
    const databaseUrl = process.env.DATABASE_URL;
    if (!databaseUrl) {
      throw new Error('DATABASE_URL environment variable is not set');
    }

    // Production: SSL always. Development: SSL unless DATABASE_SSL=false
    const isProduction = process.env.NODE_ENV === 'production';
    const sslDisabled = !isProduction && process.env.DATABASE_SSL === 'false';
    const sslConfig: boolean | { rejectUnauthorized: boolean } = sslDisabled ? false : { rejectUnauthorized: false };

    // Explicit ssl config must win over sslmode=require and friends in the URL
    let cleanConnectionString = databaseUrl;
    try {
      const url = new URL(databaseUrl);
      SSL_QUERY_PARAMS.forEach(param => url.searchParams.delete(param));
      cleanConnectionString = url.toString();
    } catch {
      logger.debug('DATABASE_URL is not a URL, using it verbatim');
    }

    pool = new Pool({
      connectionString: cleanConnectionString,
      ssl: sslConfig,
      max: 20,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });

    pool.on('error', (err) => {
      logger.error('Unexpected error on idle database client', err);
    });
  }

  return pool;
}

export async function withClient<T>(
  callback: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await getPool().connect();
  try {
    return await callback(client);
  } finally {
    client.release();
  }
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

/**
 * Graceful shutdown: run `beforeClose` (stop timers, close servers), then end the pool
 */
export function registerShutdownHandlers(beforeClose?: () => Promise<void> | void): void {
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    Promise.resolve(beforeClose?.())
      .then(() => closePool())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Shutdown failed', error);
        process.exit(1);
      });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}
