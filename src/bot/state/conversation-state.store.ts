import { Logger } from '@nestjs/common';
import { ConversationState, isConversationState } from '../contracts';
import { RedisKeys, RedisService, RedisTTL } from '../../redis';
import { BotSettings } from '../bot.settings';

/**
 * Holds the one pending state per user. Unknown users are in 'NONE'.
 * Used as the injection token; the router only sees this contract.
 */
export abstract class ConversationStateStore {
  abstract get(userId: string): Promise<ConversationState>;
  abstract set(userId: string, state: ConversationState): Promise<void>;
  abstract clear(userId: string): Promise<void>;
}

/**
 * Process-local store. Entries live until cleared or the process exits.
 */
export class InMemoryConversationStateStore extends ConversationStateStore {
  private readonly states = new Map<string, ConversationState>();

  async get(userId: string): Promise<ConversationState> {
    return this.states.get(userId) ?? 'NONE';
  }

  async set(userId: string, state: ConversationState): Promise<void> {
    if (state === 'NONE') {
      this.states.delete(userId);
      return;
    }
    this.states.set(userId, state);
  }

  async clear(userId: string): Promise<void> {
    this.states.delete(userId);
  }
}

/**
 * Redis-backed store, shared across instances.
 * Keys: `conv:{userId}:state`, expiring after RedisTTL.CONV_STATE.
 */
export class RedisConversationStateStore extends ConversationStateStore {
  private readonly log = new Logger(RedisConversationStateStore.name);

  constructor(private readonly redis: RedisService) {
    super();
  }

  async get(userId: string): Promise<ConversationState> {
    const stored = await this.redis.get(RedisKeys.convState(userId));
    if (stored === null) return 'NONE';
    if (!isConversationState(stored)) {
      this.log.warn(`[get] Ignoring unknown state "${stored}" for user ${userId}`);
      return 'NONE';
    }
    return stored;
  }

  async set(userId: string, state: ConversationState): Promise<void> {
    if (state === 'NONE') {
      await this.clear(userId);
      return;
    }
    await this.redis.set(RedisKeys.convState(userId), state, RedisTTL.CONV_STATE);
  }

  async clear(userId: string): Promise<void> {
    await this.redis.del(RedisKeys.convState(userId));
  }
}

export function createConversationStateStore(
  settings: BotSettings,
  redis: RedisService,
): ConversationStateStore {
  return settings.stateBackend === 'redis'
    ? new RedisConversationStateStore(redis)
    : new InMemoryConversationStateStore();
}
