/**
 * FILE PURPOSE: Redis URL → BullMQ connection options, shared by queue and worker
 */

export interface RedisConnectionOptions {
  host: string;
  port: number;
  password: string | undefined;
  /** Logical database from the URL path (`redis://host:6379/2`), 0 when absent. */
  db: number;
  tls: Record<string, never> | undefined;
}

export function parseRedisConnection(redisUrl?: string): RedisConnectionOptions {
  const parsed = new URL(redisUrl || process.env.REDIS_URL || 'redis://localhost:6379');
  const db = parseInt(parsed.pathname.replace(/^\//, ''), 10);

  return {
    host: parsed.hostname,
    port: parseInt(parsed.port || '6379', 10),
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    db: Number.isNaN(db) ? 0 : db,
    tls: parsed.protocol === 'rediss:' ? {} : undefined,
  };
}
