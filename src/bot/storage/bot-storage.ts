import { ContactRecord } from '../contracts';

/**
 * Persistence the dispatch engine hands data to. It never reads back from it
 * while routing.
 */
export abstract class BotStorage {
  /** Idempotent: records that a user id has been seen. */
  abstract observeUserId(userId: string): Promise<void>;

  /** Stores the latest contact of a user, replacing an older one. */
  abstract persistContact(record: ContactRecord): Promise<void>;

  abstract listUserIds(): Promise<string[]>;
}
