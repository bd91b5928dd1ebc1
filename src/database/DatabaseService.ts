/**
 * DATABASE SERVICE
 *
 * Query helpers over the PostgreSQL pool plus a Redis read-through cache.
 * Cache failures are logged and never fail the caller.
 */

import type { Pool, QueryResult, QueryResultRow } from 'pg';
import type Redis from 'ioredis';
import { getPostgresPool, getRedisClient } from './config';
import { createLogger } from '../services/Logger';

const logger = createLogger('DatabaseService');

const SLOW_QUERY_MS = 250;

export class DatabaseService {
  private redis: Redis | null = null;

  constructor(
    private readonly pool: Pool = getPostgresPool(),
    private readonly redisProvider: () => Promise<Redis> = getRedisClient
  ) {}

  /**
   * Initialize Redis connection (lazy)
   */
  private async getRedis(): Promise<Redis> {
    if (!this.redis) {
      this.redis = await this.redisProvider();
    }
    return this.redis;
  }

  /**
   * Execute a query
   */
  async query<T extends QueryResultRow>(sql: string, params: unknown[] = []): Promise<QueryResult<T>> {
    const start = Date.now();

    try {
      const result = await this.pool.query<T>(sql, params);
      const duration = Date.now() - start;

      if (duration > SLOW_QUERY_MS) {
        logger.warn(`Slow query (${duration}ms): ${sql.substring(0, 100)}...`);
      }

      return result;
    } catch (error) {
      logger.error('Query failed', error, { sql: sql.substring(0, 200) });
      throw error;
    }
  }

  /**
   * Execute a query and return single row
   */
  async queryOne<T extends QueryResultRow>(sql: string, params: unknown[] = []): Promise<T | null> {
    const result = await this.query<T>(sql, params);
    return result.rows[0] ?? null;
  }

  /**
   * Execute a query and return all rows
   */
  async queryMany<T extends QueryResultRow>(sql: string, params: unknown[] = []): Promise<T[]> {
    const result = await this.query<T>(sql, params);
    return result.rows;
  }

  /**
   * Upsert (insert or update). Re-running the same upsert is a no-op.
   */
  async upsert(
    table: string,
    data: Record<string, unknown>,
    conflictColumns: string[],
    updateColumns: string[]
  ): Promise<void> {
    const keys = Object.keys(data);
    const values = Object.values(data);
    const placeholders = keys.map((_, i) => `$${i + 1}`).join(', ');
    const columns = keys.join(', ');

    const updateSet = updateColumns
      .map(col => `${col} = EXCLUDED.${col}`)
      .join(', ');

    const sql = `
      INSERT INTO ${table} (${columns})
      VALUES (${placeholders})
      ON CONFLICT (${conflictColumns.join(', ')})
      DO UPDATE SET ${updateSet}
    `;

    await this.query(sql, values);
  }

  /**
   * Delete records
   */
  async delete(table: string, where: Record<string, unknown>): Promise<number> {
    const keys = Object.keys(where);
    const values = Object.values(where);
    const whereClause = keys.map((key, i) => `${key} = $${i + 1}`).join(' AND ');

    const result = await this.query(`DELETE FROM ${table} WHERE ${whereClause}`, values);
    return result.rowCount ?? 0;
  }

  /**
   * Cache helper - Get from cache or fetch. Null results are not cached.
   */
  async cached<T>(
    key: string,
    ttlSeconds: number,
    fetchFn: () => Promise<T | null>,
    parse: (raw: unknown) => T
  ): Promise<T | null> {
    try {
      const redis = await this.getRedis();
      const hit = await redis.get(key);
      if (hit) {
        return parse(JSON.parse(hit));
      }
    } catch (error) {
      logger.warn('Redis get failed, falling back to database', { key, error: String(error) });
    }

    const data = await fetchFn();
    if (data !== null) {
      await this.cache(key, ttlSeconds, data);
    }
    return data;
  }

  /**
   * Write-through cache update
   */
  async cache(key: string, ttlSeconds: number, data: unknown): Promise<void> {
    try {
      const redis = await this.getRedis();
      await redis.setex(key, ttlSeconds, JSON.stringify(data));
    } catch (error) {
      logger.warn('Redis set failed', { key, error: String(error) });
    }
  }

  /**
   * Invalidate cache
   */
  async invalidate(key: string): Promise<void> {
    try {
      const redis = await this.getRedis();
      await redis.del(key);
    } catch (error) {
      logger.warn('Cache invalidation failed', { key, error: String(error) });
    }
  }

  /**
   * Health check
   */
  async healthCheck(): Promise<{ postgres: boolean; redis: boolean }> {
    const health = { postgres: false, redis: false };

    // Check PostgreSQL
    try {
      await this.query('SELECT 1');
      health.postgres = true;
    } catch (error) {
      logger.error('PostgreSQL health check failed', error);
    }

    // Check Redis
    try {
      const redis = await this.getRedis();
      await redis.ping();
      health.redis = true;
    } catch (error) {
      logger.error('Redis health check failed', error);
    }

    return health;
  }
}

// Singleton instance
let dbServiceInstance: DatabaseService | null = null;

export function getDatabaseService(): DatabaseService {
  if (!dbServiceInstance) {
    dbServiceInstance = new DatabaseService();
    logger.info('DatabaseService initialized');
  }
  return dbServiceInstance;
}
