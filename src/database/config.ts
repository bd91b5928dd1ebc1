/**
 * DATABASE CONFIGURATION
 *
 * PostgreSQL + Redis connections for durable security profiles
 */

import { Pool, PoolConfig } from 'pg';
import Redis, { RedisOptions } from 'ioredis';
import { ENV } from '../config/environment';
import { createLogger } from '../services/Logger';

const logger = createLogger('Database');

// PostgreSQL Configuration
export const PG_CONFIG: PoolConfig = ENV.DATABASE_URL ? {
  connectionString: ENV.DATABASE_URL,
  max: 20,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 5000,
  statement_timeout: 5000, // profile reads sit on the message hot path
  keepAlive: true,
} : {
  host: ENV.DB_HOST,
  port: ENV.DB_PORT,
  database: ENV.DB_NAME,
  user: ENV.DB_USER,
  password: ENV.DB_PASSWORD,
  max: 20,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 5000,
  statement_timeout: 5000,
  keepAlive: true,
};

// Redis Configuration
export const REDIS_CONFIG: RedisOptions = {
  port: ENV.REDIS_PORT,
  host: ENV.REDIS_HOST,
  lazyConnect: true,
  maxRetriesPerRequest: 1,
  retryStrategy: (times: number) => {
    if (times > 10) {
      logger.error('Redis connection failed after 10 retries');
      return null; // Stop retrying
    }
    return times * 100;
  },
};

// Database Connection Pools (Singleton)
let pgPool: Pool | null = null;
let redisClient: Redis | null = null;

/**
 * Get PostgreSQL connection pool
 */
export function getPostgresPool(): Pool {
  if (!pgPool) {
    pgPool = new Pool(PG_CONFIG);

    pgPool.on('error', (err) => {
      logger.error('Unexpected PostgreSQL pool error', err);
    });

    logger.info('PostgreSQL connection pool created');
  }

  return pgPool;
}

/**
 * Get Redis client
 */
export async function getRedisClient(): Promise<Redis> {
  if (!redisClient) {
    const client = new Redis(REDIS_CONFIG);

    client.on('error', (err: Error) => {
      logger.error('Redis client error', err);
    });

    client.on('reconnecting', () => {
      logger.warn('Redis client reconnecting...');
    });

    try {
      await client.connect();
    } catch (error) {
      client.disconnect();
      throw error;
    }
    logger.info('Redis client connected');
    redisClient = client;
  }

  return redisClient;
}

/**
 * Close all database connections
 */
export async function closeConnections(): Promise<void> {
  if (pgPool) {
    await pgPool.end();
    logger.info('PostgreSQL pool closed');
    pgPool = null;
  }

  if (redisClient) {
    redisClient.disconnect();
    logger.info('Redis client closed');
    redisClient = null;
  }
}
