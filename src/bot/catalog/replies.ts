import { ReplyDescriptor } from '../contracts';

const MARKDOWN_SPECIALS = /([_*`[])/g;

/**
 * Escapes user-supplied text for Telegram's legacy Markdown parse mode.
 */
export function escapeMarkdown(text: string): string {
  return text.replace(MARKDOWN_SPECIALS, '\\$1');
}

/**
 * Fixed replies that are not catalog entries.
 */
export const Replies = {
  invalidContactFormat: {
    text: '⚠️ Invalid format. Please try again using: *Name +123456789012*',
  } satisfies ReplyDescriptor,

  unrecognized: {
    text: "I didn't understand that. Please use the buttons or type /start.",
  } satisfies ReplyDescriptor,

  registrationError: {
    text: 'An unexpected error occurred during registration. Try again.',
  } satisfies ReplyDescriptor,

  unknownOption(callbackId: string): ReplyDescriptor {
    return { text: `Unknown option: \`${callbackId}\`\n\nTry /start` };
  },

  contactSaved(name: string, phone: string): ReplyDescriptor {
    return {
      text: `✅ Information for *${escapeMarkdown(name)}* received and saved. Phone: \`${phone}\``,
    };
  },

  missingMedia(resource: string, text?: string): ReplyDescriptor {
    return {
      text: `⚠️ Media file not found for \`${resource}\`. ${text ?? 'Placeholder message.'}`,
    };
  },
};
