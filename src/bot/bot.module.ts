import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BotController } from './bot.controller';
import { BotService } from './bot.service';
import { TelegramAdapter } from './adapters/telegram.adapter';
import { TransportClient } from './adapters/transport';
import { BOT_SETTINGS, loadBotSettings } from './bot.settings';
import { ResponseCatalog } from './catalog/response-catalog';
import { DEFAULT_CATALOG } from './catalog/default-catalog';
import {
  ConversationStateStore,
  createConversationStateStore,
} from './state/conversation-state.store';
import { BotStorage } from './storage/bot-storage';
import { SupabaseBotStorage } from './storage/supabase-bot.storage';
import { DispatchRouter } from './router/dispatch-router.service';
import { DeliveryService } from './delivery/delivery.service';
import { DelayedSendScheduler } from './delivery/delayed-send.scheduler';
import { SupabaseModule } from '../supabase/supabase.module';
import { RedisService } from '../redis';

@Module({
  imports: [SupabaseModule],
  controllers: [BotController],
  providers: [
    {
      provide: BOT_SETTINGS,
      useFactory: loadBotSettings,
      inject: [ConfigService],
    },
    TelegramAdapter,
    { provide: TransportClient, useExisting: TelegramAdapter },
    {
      provide: ResponseCatalog,
      useFactory: () => new ResponseCatalog(DEFAULT_CATALOG),
    },
    {
      provide: ConversationStateStore,
      useFactory: createConversationStateStore,
      inject: [BOT_SETTINGS, RedisService],
    },
    { provide: BotStorage, useClass: SupabaseBotStorage },
    DispatchRouter,
    DelayedSendScheduler,
    DeliveryService,
    BotService,
  ],
  exports: [BotService, BotStorage],
})
export class BotModule {}
