import { Inject, Injectable, Logger } from '@nestjs/common';
import { SupabaseClient } from '@supabase/supabase-js';
import { ContactRecord } from '../contracts';
import { SUPABASE } from '../../supabase/supabase.module';
import { BotStorage } from './bot-storage';

interface BotUserRow {
  telegram_id: string;
}

/**
 * Tables:
 * - `bot_users (telegram_id text unique, created_at)`: every chat id seen
 * - `bot_contacts (user_id text primary key, name, phone, captured_at)`
 */
@Injectable()
export class SupabaseBotStorage extends BotStorage {
  private readonly log = new Logger(SupabaseBotStorage.name);

  constructor(@Inject(SUPABASE) private readonly supabase: SupabaseClient) {
    super();
  }

  async observeUserId(userId: string): Promise<void> {
    const { error } = await this.supabase
      .from('bot_users')
      .upsert(
        { telegram_id: userId },
        { onConflict: 'telegram_id', ignoreDuplicates: true },
      );

    if (error) throw new Error(`bot_users upsert failed: ${error.message}`);
  }

  async persistContact(record: ContactRecord): Promise<void> {
    const { error } = await this.supabase.from('bot_contacts').upsert(
      {
        user_id: record.userId,
        name: record.name,
        phone: record.phoneNumber,
        captured_at: record.capturedAt,
      },
      { onConflict: 'user_id' },
    );

    if (error) throw new Error(`bot_contacts upsert failed: ${error.message}`);
    this.log.debug(`[persistContact] Saved contact for user ${record.userId}`);
  }

  async listUserIds(): Promise<string[]> {
    const { data, error } = await this.supabase
      .from('bot_users')
      .select('telegram_id')
      .order('created_at', { ascending: true });

    if (error) throw new Error(`bot_users select failed: ${error.message}`);
    return (data ?? []).map((row: BotUserRow) => String(row.telegram_id));
  }
}
