/**
 * Pending conversation state per user. 'NONE' means no structured input is expected.
 */
export type ConversationState = 'NONE' | 'AWAITING_CONTACT';

export const CONVERSATION_STATES: readonly ConversationState[] = [
  'NONE',
  'AWAITING_CONTACT',
];

export function isConversationState(value: unknown): value is ConversationState {
  return CONVERSATION_STATES.some((state) => state === value);
}

export type MediaKind = 'photo' | 'document';

export interface MediaRef {
  kind: MediaKind;
  path: string; // relative to MEDIA_DIR
}

/**
 * What to send back, before it becomes transport calls.
 * Each button label is also the callback id returned when it is pressed.
 */
export interface ReplyDescriptor {
  readonly text?: string;
  readonly buttons?: readonly string[];
  readonly media?: MediaRef;
  readonly followUpText?: string;
}

/**
 * A descriptor without text and without media must never be dispatched.
 */
export function isDispatchable(reply: ReplyDescriptor): boolean {
  return Boolean(reply.text) || reply.media !== undefined;
}

export interface TextMessageEvent {
  type: 'text';
  userId: string; // chat_id
  rawText: string;
  messageId?: string;
}

export interface ButtonPressEvent {
  type: 'button';
  userId: string; // chat_id
  callbackId: string; // button label
  callbackQueryId: string; // used to acknowledge the press
}

export type InboundEvent = TextMessageEvent | ButtonPressEvent;

export interface ContactRecord {
  userId: string;
  name: string;
  phoneNumber: string;
  capturedAt: string; // ISO-8601
}
