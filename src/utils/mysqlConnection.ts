import mysql, { Pool, PoolOptions, RowDataPacket } from 'mysql2/promise';
import { DatabaseConfig } from '../types/access';
import { createLogger } from './loggers';

const logger = createLogger('mysql');

export type QueryParams = Record<string, string | number | boolean | null>;

// Connection drops, timeouts and lock contention; anything else will fail again
const TRANSIENT_ERROR_CODES = new Set([
  'PROTOCOL_CONNECTION_LOST',
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'ER_CON_COUNT_ERROR',
  'ER_LOCK_DEADLOCK',
  'ER_LOCK_WAIT_TIMEOUT',
]);

function errorCode(error: unknown): string | undefined {
  return error && typeof error === 'object' && 'code' in error
    ? String(error.code)
    : undefined;
}

export function isTransientDbError(error: unknown): boolean {
  const code = errorCode(error);
  return code !== undefined && TRANSIENT_ERROR_CODES.has(code);
}

function poolOptions(config: DatabaseConfig): PoolOptions {
  const shared: PoolOptions = {
    connectionLimit: config.connectionLimit,
    connectTimeout: 30000,
    namedPlaceholders: true,
    // DATETIME columns hold UTC instants; DATE columns stay calendar strings
    timezone: 'Z',
    dateStrings: ['DATE'],
  };

  return config.url
    ? { ...shared, uri: config.url.replace(/^mysql\+\w+:\/\//, 'mysql://') }
    : {
        ...shared,
        host: config.host,
        port: config.port,
        user: config.user,
        password: config.password,
        database: config.database,
      };
}

export function createPool(config: DatabaseConfig): Pool {
  return mysql.createPool(poolOptions(config));
}

export async function query<T extends RowDataPacket>(
  pool: Pool,
  sql: string,
  params: QueryParams = {},
): Promise<T[]> {
  try {
    const [rows] = await pool.query<T[]>(sql, params);
    return rows;
  } catch (error) {
    logger.error('MySQL query error', {
      code: errorCode(error),
      message: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }
}
