import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { randomUUID } from 'crypto';

interface FallbackEntry {
  value: string;
  expiresAt: number;
}

/**
 * Redis access with an in-memory fallback for single-instance deployments.
 * GUARD: with MULTI_INSTANCE=true an unavailable Redis makes every call throw.
 */
@Injectable()
export class RedisService implements OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);
  private client: Redis | null = null;
  private readonly fallbackCache = new Map<string, FallbackEntry>();
  private readonly multiInstance: boolean;
  private connected = false;

  constructor(private readonly config: ConfigService) {
    this.multiInstance = config.get<string>('MULTI_INSTANCE') === 'true';
    this.initializeClient();
  }

  private initializeClient() {
    const redisUrl = this.config.get<string>('REDIS_URL');

    if (!redisUrl) {
      this.logger.warn('REDIS_URL not configured, using in-memory fallback');
      return;
    }

    const client = new Redis(redisUrl, {
      maxRetriesPerRequest: 3,
      retryStrategy: (times) => {
        if (times > 3) return null;
        return Math.min(times * 100, 2000);
      },
      lazyConnect: true,
    });

    client.on('connect', () => {
      this.connected = true;
      this.logger.log('Redis connected');
    });

    client.on('error', (err: Error) => {
      this.connected = false;
      this.logger.error(`Redis error: ${err.message}`);
    });

    client.on('close', () => {
      this.connected = false;
      this.logger.warn('Redis connection closed');
    });

    client.connect().catch((err: Error) => {
      this.logger.error(`Failed to connect to Redis: ${err.message}`);
    });

    this.client = client;
  }

  async onModuleDestroy() {
    if (this.client) {
      await this.client.quit();
    }
  }

  /**
   * Returns the live client, or null when the in-memory fallback applies.
   */
  private activeClient(): Redis | null {
    if (this.connected && this.client) {
      return this.client;
    }
    if (this.multiInstance) {
      throw new Error('Redis unavailable in multi-instance mode');
    }
    return null;
  }

  async get(key: string): Promise<string | null> {
    const client = this.activeClient();
    if (client) {
      return client.get(key);
    }

    const entry = this.fallbackCache.get(key);
    if (entry && entry.expiresAt > Date.now()) {
      return entry.value;
    }
    this.fallbackCache.delete(key);
    return null;
  }

  /**
   * Set value with TTL (seconds)
   */
  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    const client = this.activeClient();
    if (client) {
      await client.setex(key, ttlSeconds, value);
      return;
    }

    this.fallbackCache.set(key, {
      value,
      expiresAt: Date.now() + ttlSeconds * 1000,
    });
  }

  async del(key: string): Promise<void> {
    const client = this.activeClient();
    if (client) {
      await client.del(key);
      return;
    }

    this.fallbackCache.delete(key);
  }

  /**
   * Sliding-window rate limit on a sorted set; a fixed-window counter in fallback mode.
   * Returns false once `maxRequests` were seen inside `windowMs`.
   */
  async rateLimitCheck(
    key: string,
    maxRequests: number,
    windowMs: number,
  ): Promise<boolean> {
    const now = Date.now();
    const client = this.activeClient();

    if (client) {
      await client.zremrangebyscore(key, '-inf', now - windowMs);

      const count = await client.zcard(key);
      if (count >= maxRequests) {
        return false;
      }

      await client.zadd(key, now, `${now}-${randomUUID().slice(0, 8)}`);
      await client.expire(key, Math.ceil(windowMs / 1000));
      return true;
    }

    const existing = this.fallbackCache.get(key);
    const count =
      existing && existing.expiresAt > now ? parseInt(existing.value, 10) || 0 : 0;
    if (count >= maxRequests) {
      return false;
    }
    this.fallbackCache.set(key, {
      value: String(count + 1),
      expiresAt: existing && existing.expiresAt > now ? existing.expiresAt : now + windowMs,
    });
    return true;
  }

  async isHealthy(): Promise<boolean> {
    if (!this.client || !this.connected) {
      return !this.multiInstance;
    }

    try {
      return (await this.client.ping()) === 'PONG';
    } catch {
      return !this.multiInstance;
    }
  }

  getStatus(): { connected: boolean; mode: 'redis' | 'fallback' } {
    return {
      connected: this.connected,
      mode: this.connected && this.client ? 'redis' : 'fallback',
    };
  }
}
