export { RedisModule } from './redis.module';
export { RedisService } from './redis.service';
export { RedisHealthIndicator } from './redis.health';
export { RedisKeys, RedisTTL } from './keys';
