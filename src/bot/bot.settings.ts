import { ConfigService } from '@nestjs/config';

export const BOT_SETTINGS = 'BOT_SETTINGS';

export type StateBackend = 'memory' | 'redis';

export interface BotSettings {
  followUpDelayMs: number;
  cancelFollowUpsOnNewEvent: boolean;
  stateBackend: StateBackend;
  rateLimitMax: number;
  rateLimitWindowMs: number;
}

export const DEFAULT_BOT_SETTINGS: BotSettings = {
  followUpDelayMs: 3000,
  cancelFollowUpsOnNewEvent: false,
  stateBackend: 'memory',
  rateLimitMax: 30,
  rateLimitWindowMs: 60_000,
};

// Node clamps longer timeouts to 1ms
const MAX_TIMER_DELAY_MS = 2_147_483_647;

function parseNonNegativeInt(
  raw: string | undefined,
  fallback: number,
  max = Number.MAX_SAFE_INTEGER,
): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isInteger(value) && value >= 0 && value <= max ? value : fallback;
}

function parseFlag(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined) return fallback;
  return ['1', 'true', 'yes'].includes(raw.trim().toLowerCase());
}

/**
 * Reads the bot's tunables once at startup. Malformed values fall back to defaults.
 */
export function loadBotSettings(cfg: ConfigService): BotSettings {
  const backend = cfg.get<string>('CONVERSATION_STATE_BACKEND');

  return {
    followUpDelayMs: parseNonNegativeInt(
      cfg.get<string>('FOLLOW_UP_DELAY_MS'),
      DEFAULT_BOT_SETTINGS.followUpDelayMs,
      MAX_TIMER_DELAY_MS,
    ),
    cancelFollowUpsOnNewEvent: parseFlag(
      cfg.get<string>('FOLLOW_UP_CANCEL_ON_NEW_EVENT'),
      DEFAULT_BOT_SETTINGS.cancelFollowUpsOnNewEvent,
    ),
    stateBackend: backend === 'redis' ? 'redis' : DEFAULT_BOT_SETTINGS.stateBackend,
    rateLimitMax: parseNonNegativeInt(
      cfg.get<string>('RATE_LIMIT_MAX'),
      DEFAULT_BOT_SETTINGS.rateLimitMax,
    ),
    rateLimitWindowMs: parseNonNegativeInt(
      cfg.get<string>('RATE_LIMIT_WINDOW_MS'),
      DEFAULT_BOT_SETTINGS.rateLimitWindowMs,
    ),
  };
}
