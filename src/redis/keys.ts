/**
 * Redis key patterns and TTLs used by the bot.
 */
export const RedisKeys = {
  // Pending conversation state (one per user)
  convState: (userId: string) => `conv:${userId}:state`,

  // Webhook rate limiting (sliding window)
  rateLimit: (userId: string) => `rl:${userId}`,
};

/**
 * TTL constants in seconds
 */
export const RedisTTL = {
  CONV_STATE: 10 * 60, // 10 minutes
};
