import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpException,
  HttpStatus,
  Inject,
  InternalServerErrorException,
  Logger,
  Post,
} from '@nestjs/common';
import { BotService } from './bot.service';
import { TelegramAdapter } from './adapters/telegram.adapter';
import { BotStorage } from './storage/bot-storage';
import { BOT_SETTINGS, BotSettings } from './bot.settings';
import { describeError } from './adapters/transport.errors';
import { AsyncRateLimiter, createAsyncRateLimiter } from '../common/utils/resilience';
import { RedisKeys, RedisService } from '../redis';

@Controller()
export class BotController {
  private readonly log = new Logger(BotController.name);
  private readonly rateLimiter: AsyncRateLimiter;

  constructor(
    private readonly bot: BotService,
    private readonly tg: TelegramAdapter,
    private readonly storage: BotStorage,
    redis: RedisService,
    @Inject(BOT_SETTINGS) settings: BotSettings,
  ) {
    this.rateLimiter = createAsyncRateLimiter(
      redis,
      settings.rateLimitMax,
      settings.rateLimitWindowMs,
    );
  }

  /**
   * Throws 429 Too Many Requests once a user exceeds the webhook rate limit.
   */
  private async checkRateLimit(userId: string): Promise<void> {
    const allowed = await this.rateLimiter.isAllowed(RedisKeys.rateLimit(userId));
    if (!allowed) {
      this.log.warn(`[RateLimit] Exceeded for telegram/${userId}`);
      throw new HttpException(
        'Too many messages. Wait a moment before sending more.',
        HttpStatus.TOO_MANY_REQUESTS,
      );
    }
  }

  @Post('telegram/webhook')
  @HttpCode(HttpStatus.OK)
  async telegram(@Body() body: unknown) {
    const event = this.tg.fromIncoming(body);
    if (!event) {
      this.log.debug('[TG] Update ignored');
      return { ok: true };
    }

    await this.checkRateLimit(event.userId);

    const result = await this.bot.handle(event);
    this.log.debug(`[TG] ${result.correlationId} outcome=${result.outcome}`);
    return { ok: true };
  }

  @Get('users')
  async users() {
    try {
      return { user_ids: await this.storage.listUserIds() };
    } catch (err) {
      this.log.error(`[users] ${describeError(err)}`);
      throw new InternalServerErrorException('Could not list users');
    }
  }
}
