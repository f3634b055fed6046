import { Injectable } from '@nestjs/common';
import { RedisService } from './redis.service';

export interface RedisHealth {
  redis: { status: 'up' | 'down'; mode: 'redis' | 'fallback' };
}

/**
 * Redis section of the health endpoint.
 */
@Injectable()
export class RedisHealthIndicator {
  constructor(private readonly redis: RedisService) {}

  async check(): Promise<RedisHealth> {
    const isHealthy = await this.redis.isHealthy();
    const { mode } = this.redis.getStatus();

    return {
      redis: {
        status: isHealthy ? 'up' : 'down',
        mode,
      },
    };
  }
}
