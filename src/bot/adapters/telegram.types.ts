/**
 * Subset of the Telegram Bot API payloads this bot sends and receives.
 */

export interface InlineKeyboardButton {
  text: string;
  callback_data: string;
}

export interface InlineKeyboardMarkup {
  inline_keyboard: InlineKeyboardButton[][];
}

export type TelegramParseMode = 'Markdown' | 'MarkdownV2' | 'HTML';

export interface SendMessagePayload {
  chat_id: string;
  text: string;
  parse_mode: TelegramParseMode;
  reply_markup?: InlineKeyboardMarkup;
}

export interface AnswerCallbackQueryPayload {
  callback_query_id: string;
}

export interface SetWebhookPayload {
  url: string;
}

export interface TelegramApiResponse<T> {
  ok: boolean;
  result?: T;
  description?: string;
  error_code?: number;
}

/**
 * One button per row; each button returns its own label as callback data.
 */
export function buildInlineKeyboard(labels: readonly string[]): InlineKeyboardMarkup {
  return {
    inline_keyboard: labels.map((label) => [{ text: label, callback_data: label }]),
  };
}
