import { ContactRecord, MediaRef } from '../contracts';
import { TransportClient } from '../adapters/transport';
import { BotStorage } from '../storage/bot-storage';
import { BotSettings, DEFAULT_BOT_SETTINGS } from '../bot.settings';

export interface SentText {
  userId: string;
  text: string;
  buttons: readonly string[];
}

export interface SentMedia {
  userId: string;
  media: MediaRef;
  caption: string;
}

/**
 * Records every outbound call. Queued errors are thrown by the next matching call.
 */
export class FakeTransport extends TransportClient {
  readonly texts: SentText[] = [];
  readonly media: SentMedia[] = [];
  readonly acks: string[] = [];
  readonly textErrors: Error[] = [];
  readonly mediaErrors: Error[] = [];
  ackError: Error | null = null;

  async sendText(userId: string, text: string, buttons: readonly string[] = []) {
    const error = this.textErrors.shift();
    if (error) throw error;
    this.texts.push({ userId, text, buttons });
  }

  async sendMedia(userId: string, media: MediaRef, caption: string) {
    const error = this.mediaErrors.shift();
    if (error) throw error;
    this.media.push({ userId, media, caption });
  }

  async acknowledgeCallback(callbackQueryId: string) {
    if (this.ackError) throw this.ackError;
    this.acks.push(callbackQueryId);
  }
}

export class FakeStorage extends BotStorage {
  readonly observed = new Set<string>();
  readonly contacts: ContactRecord[] = [];
  persistError: Error | null = null;
  observeError: Error | null = null;

  async observeUserId(userId: string) {
    if (this.observeError) throw this.observeError;
    this.observed.add(userId);
  }

  async persistContact(record: ContactRecord) {
    if (this.persistError) throw this.persistError;
    const existing = this.contacts.findIndex((c) => c.userId === record.userId);
    if (existing >= 0) {
      this.contacts.splice(existing, 1, record);
    } else {
      this.contacts.push(record);
    }
  }

  async listUserIds() {
    return [...this.observed];
  }
}

export function testSettings(overrides: Partial<BotSettings> = {}): BotSettings {
  return { ...DEFAULT_BOT_SETTINGS, ...overrides };
}
