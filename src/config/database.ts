/**
 * MySQL database configuration and connection pool
 */

import { createPool, Pool, PoolOptions } from 'mysql2/promise';
import * as dotenv from 'dotenv';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

dotenv.config();

/**
 * Database configuration from environment variables
 */
function dbConfig(): PoolOptions {
  return {
    host: process.env.MYSQL_HOST || 'localhost',
    port: parseInt(process.env.MYSQL_PORT || '3306', 10),
    user: process.env.MYSQL_USER || 'crawler',
    password: process.env.MYSQL_PASSWORD || '',
    database: process.env.MYSQL_DATABASE || 'crawler_db',
    waitForConnections: true,
    connectionLimit: 10,
    queueLimit: 0,
    enableKeepAlive: true,
    keepAliveInitialDelay: 0,
  };
}

let pool: Pool | null = null;

/**
 * MySQL connection pool, created on first use
 * Only runs started with --db ever open one
 */
export function getPool(): Pool {
  if (!pool) {
    pool = createPool(dbConfig());
  }
  return pool;
}

/**
 * Test database connection
 * Call this on application startup to verify connectivity
 */
export async function testConnection(): Promise<void> {
  try {
    const connection = await getPool().getConnection();
    logger.info('Database connected successfully');
    connection.release();
  } catch (error) {
    logger.error({ error: errorMessage(error) }, 'Database connection failed');
    throw error;
  }
}

/**
 * Close all connections in the pool
 * Call this on application shutdown
 */
export async function closePool(): Promise<void> {
  if (!pool) return;
  await pool.end();
  pool = null;
  logger.info('Database connection pool closed');
}
