import { Controller, Get } from '@nestjs/common';
import { RedisHealthIndicator } from './redis';

@Controller()
export class AppController {
  constructor(private readonly redisHealth: RedisHealthIndicator) {}

  @Get()
  async health() {
    return {
      status: 'ok',
      message: 'Telegram bot is running!',
      ...(await this.redisHealth.check()),
    };
  }
}
