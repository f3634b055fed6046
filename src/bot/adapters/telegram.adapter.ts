import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { openAsBlob } from 'fs';
import { basename, resolve } from 'path';
import { InboundEvent, MediaRef } from '../contracts';
import { TransportClient } from './transport';
import { MediaNotFoundError, TransportError, describeError } from './transport.errors';
import {
  AnswerCallbackQueryPayload,
  SendMessagePayload,
  SetWebhookPayload,
  TelegramApiResponse,
  buildInlineKeyboard,
} from './telegram.types';

const DEFAULT_API_BASE = 'https://api.telegram.org';
const REQUEST_TIMEOUT_MS = 10_000;

/**
 * Reads `key` from an untrusted JSON value, undefined when absent.
 */
function readField(source: unknown, key: string): unknown {
  if (typeof source !== 'object' || source === null || !(key in source)) {
    return undefined;
  }
  const value: unknown = Reflect.get(source, key);
  return value;
}

function readId(value: unknown): string | null {
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value === 'string' && value !== '') return value;
  return null;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

@Injectable()
export class TelegramAdapter extends TransportClient implements OnModuleInit {
  private readonly log = new Logger(TelegramAdapter.name);

  constructor(private readonly cfg: ConfigService) {
    super();
  }

  /**
   * Registers the webhook on startup when TELEGRAM_WEBHOOK_URL is set.
   */
  async onModuleInit() {
    const webhookUrl = this.cfg.get<string>('TELEGRAM_WEBHOOK_URL');
    if (!webhookUrl) return;

    try {
      await this.setWebhook(webhookUrl);
      this.log.log(`Webhook registered at ${webhookUrl}`);
    } catch (err) {
      this.log.error(`setWebhook failed: ${describeError(err)}`);
    }
  }

  /**
   * Decodes a webhook update into an inbound event.
   * Returns null for update kinds the bot does not handle.
   */
  fromIncoming(body: unknown): InboundEvent | null {
    const callback = readField(body, 'callback_query');
    if (callback !== undefined) {
      return this.fromCallbackQuery(callback);
    }

    const message = readField(body, 'message');
    if (message !== undefined) {
      return this.fromMessage(message);
    }

    this.log.debug('Telegram update without message or callback_query');
    return null;
  }

  private fromMessage(message: unknown): InboundEvent | null {
    const chatId = readId(readField(readField(message, 'chat'), 'id'));
    if (!chatId) {
      this.log.warn('Telegram message without chat id');
      return null;
    }

    const text = readField(message, 'text');
    const messageId = readId(readField(message, 'message_id'));

    return {
      type: 'text',
      userId: chatId,
      rawText: typeof text === 'string' ? text : '',
      ...(messageId !== null && { messageId }),
    };
  }

  private fromCallbackQuery(query: unknown): InboundEvent | null {
    const queryId = readId(readField(query, 'id'));
    const data = readField(query, 'data');
    const chatId = readId(
      readField(readField(readField(query, 'message'), 'chat'), 'id'),
    );

    if (!queryId || !chatId || typeof data !== 'string') {
      this.log.warn('Telegram callback_query without id, chat or data');
      return null;
    }

    return {
      type: 'button',
      userId: chatId,
      callbackId: data,
      callbackQueryId: queryId,
    };
  }

  async sendText(
    userId: string,
    text: string,
    buttons: readonly string[] = [],
  ): Promise<void> {
    const payload: SendMessagePayload = {
      chat_id: userId,
      text,
      parse_mode: 'Markdown',
    };
    if (buttons.length > 0) {
      payload.reply_markup = buildInlineKeyboard(buttons);
    }

    await this.call('sendMessage', payload);
    this.log.debug(`TG message sent to ${userId}`);
  }

  /**
   * Uploads a file from MEDIA_DIR as a photo or document.
   * A missing file rejects with MediaNotFoundError before any request is made.
   */
  async sendMedia(userId: string, media: MediaRef, caption: string): Promise<void> {
    const filePath = resolve(this.mediaDir(), media.path);

    const file = await openAsBlob(filePath).catch((err: unknown) => {
      if (isMissingFile(err)) {
        throw new MediaNotFoundError(media.path, filePath);
      }
      throw err;
    });

    const form = new FormData();
    form.append('chat_id', userId);
    form.append('caption', caption);
    form.append('parse_mode', 'Markdown');
    form.append(media.kind, file, basename(filePath));

    await this.call(media.kind === 'photo' ? 'sendPhoto' : 'sendDocument', form);
    this.log.debug(`TG ${media.kind} sent to ${userId}`);
  }

  async acknowledgeCallback(callbackQueryId: string): Promise<void> {
    const payload: AnswerCallbackQueryPayload = { callback_query_id: callbackQueryId };
    await this.call('answerCallbackQuery', payload);
  }

  async setWebhook(url: string): Promise<void> {
    const payload: SetWebhookPayload = { url };
    await this.call('setWebhook', payload);
  }

  private mediaDir(): string {
    return this.cfg.get<string>('MEDIA_DIR') ?? resolve(process.cwd(), 'media');
  }

  private methodUrl(method: string): string {
    const token = this.cfg.get<string>('TELEGRAM_BOT_TOKEN');
    if (!token) {
      throw new TransportError(method, 'TELEGRAM_BOT_TOKEN not configured');
    }
    const base = this.cfg.get<string>('TELEGRAM_API_BASE') ?? DEFAULT_API_BASE;
    return `${base}/bot${token}/${method}`;
  }

  /**
   * Single attempt against the Bot API. No retries: a failed send is dropped by the caller.
   */
  private async call(method: string, body: object): Promise<void> {
    const url = this.methodUrl(method);

    let data: TelegramApiResponse<unknown>;
    try {
      const response = await axios.post<TelegramApiResponse<unknown>>(url, body, {
        timeout: REQUEST_TIMEOUT_MS,
      });
      data = response.data;
    } catch (e) {
      if (axios.isAxiosError<unknown>(e)) {
        const status = e.response?.status ?? null;
        const description = readField(e.response?.data, 'description');
        const detail = typeof description === 'string' ? description : null;
        throw new TransportError(
          method,
          `Telegram ${method} failed (${status ?? e.code ?? 'network'}): ${detail ?? e.message}`,
          status,
          detail,
        );
      }
      throw new TransportError(method, `Telegram ${method} failed: ${describeError(e)}`);
    }

    if (!data.ok) {
      throw new TransportError(
        method,
        `Telegram ${method} returned ok=false: ${data.description ?? 'no description'}`,
        data.error_code ?? null,
        data.description ?? null,
      );
    }
  }
}
