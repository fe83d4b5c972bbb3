import { StorageAdapter } from 'grammy';
import Redis from 'ioredis';
import { ConfigService } from '@nestjs/config';
import { Logger, OnApplicationShutdown } from '@nestjs/common';
import { Session, isSession } from './conversation/conversation.types';

const logger = new Logger('SessionStorage');

export const SESSION_STORAGE = Symbol('SESSION_STORAGE');

export type SessionStorage = StorageAdapter<Session>;

export const SESSION_TTL_SECONDS = 86400; // 24 hours

export function isRedisConfigured(configService: ConfigService): boolean {
  return !!configService.get<string>('redis.host');
}

interface StoredSession<T> {
  value: T;
  expiresAt: number;
}

/**
 * In-memory session storage. Sessions are lost on restart and expire after
 * the same TTL Redis applies. Stale entries are swept on every write.
 */
export class MemorySessionStorage<T> implements StorageAdapter<T> {
  private sessions: Map<string, StoredSession<T>> = new Map();

  constructor(
    private readonly ttlMs = SESSION_TTL_SECONDS * 1000,
    private readonly now: () => number = Date.now,
  ) {}

  read(key: string): Promise<T | undefined> {
    const entry = this.sessions.get(key);
    if (entry && entry.expiresAt <= this.now()) {
      this.sessions.delete(key);
      return Promise.resolve(undefined);
    }
    return Promise.resolve(entry?.value);
  }

  write(key: string, value: T): Promise<void> {
    this.evictExpired();
    this.sessions.set(key, { value, expiresAt: this.now() + this.ttlMs });
    return Promise.resolve();
  }

  delete(key: string): Promise<void> {
    this.sessions.delete(key);
    return Promise.resolve();
  }

  get size(): number {
    return this.sessions.size;
  }

  private evictExpired(): void {
    const now = this.now();
    for (const [key, entry] of this.sessions) {
      if (entry.expiresAt <= now) this.sessions.delete(key);
    }
  }
}

/**
 * Redis session storage with TTL, so a conversation survives a restart.
 * Records that fail to parse or validate are dropped, never patched up.
 */
export class RedisSessionStorage implements StorageAdapter<Session>, OnApplicationShutdown {
  constructor(private readonly redis: Redis) {}

  async read(key: string): Promise<Session | undefined> {
    const data = await this.redis.get(key);
    if (!data) return undefined;

    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch {
      logger.warn(`Discarding unreadable session for key ${key}`);
      return undefined;
    }

    if (!isSession(parsed)) {
      logger.warn(`Discarding malformed session for key ${key}`);
      return undefined;
    }
    return parsed;
  }

  async write(key: string, value: Session): Promise<void> {
    await this.redis.set(key, JSON.stringify(value), 'EX', SESSION_TTL_SECONDS);
  }

  async delete(key: string): Promise<void> {
    await this.redis.del(key);
  }

  async onApplicationShutdown() {
    await this.redis.quit();
  }
}

/**
 * Create session storage - Redis if configured, otherwise in-memory
 */
export function createSessionStorage(
  configService: ConfigService,
): { storage: SessionStorage; type: 'redis' | 'memory' } {
  if (!isRedisConfigured(configService)) {
    logger.warn('Redis not configured, using in-memory session storage');
    return {
      storage: new MemorySessionStorage<Session>(),
      type: 'memory',
    };
  }

  const redis = new Redis({
    host: configService.get<string>('redis.host'),
    port: configService.get<number>('redis.port') || 6379,
    password: configService.get<string>('redis.password'),
    keyPrefix: 'parts-bot:session:',
    maxRetriesPerRequest: 3,
    retryStrategy(times) {
      if (times > 3) {
        logger.error('Redis connection failed after 3 retries');
        return null; // Stop retrying
      }
      return Math.min(times * 100, 3000);
    },
    lazyConnect: true,
  });

  redis.on('error', (err: Error) => {
    logger.error(`Redis connection error: ${err.message}`);
  });

  logger.log(`Using Redis session storage at ${configService.get<string>('redis.host')}`);
  return {
    storage: new RedisSessionStorage(redis),
    type: 'redis',
  };
}
