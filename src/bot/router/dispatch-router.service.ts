import { Injectable } from '@nestjs/common';
import {
  ButtonPressEvent,
  ContactRecord,
  ConversationState,
  InboundEvent,
  ReplyDescriptor,
  TextMessageEvent,
} from '../contracts';
import { REGISTER_BUTTON, ResponseCatalog, START_COMMAND } from '../catalog/response-catalog';
import { Replies } from '../catalog/replies';
import { ConversationStateStore } from '../state/conversation-state.store';
import { BotStorage } from '../storage/bot-storage';
import { TransportClient } from '../adapters/transport';
import { describeError } from '../adapters/transport.errors';
import { validateContact } from '../validation/contact-validator';
import { debugLog } from '../../common/utils/debug-logger';

export type DispatchOutcome =
  | 'register_started'
  | 'button_reply'
  | 'unknown_option'
  | 'contact_saved'
  | 'contact_invalid'
  | 'contact_error'
  | 'start'
  | 'catalog_reply'
  | 'unrecognized';

export interface DispatchResult {
  outcome: DispatchOutcome;
  /** Sent in order. Only a completed registration yields more than one. */
  replies: ReplyDescriptor[];
  /** The user's state after routing. */
  state: ConversationState;
  contact?: ContactRecord;
}

/**
 * Decides the reply to an inbound event.
 *
 * Priority, first match wins:
 * 1. button press: Register opens contact capture, catalog keys answer, anything else is an unknown option
 * 2. /start: reset and greet, also in the middle of contact capture
 * 3. text while awaiting contact: validate and store, or ask again
 * 4. text equal to a catalog key
 * 5. fallback
 */
@Injectable()
export class DispatchRouter {
  private readonly log = debugLog.router;

  constructor(
    private readonly catalog: ResponseCatalog,
    private readonly states: ConversationStateStore,
    private readonly storage: BotStorage,
    private readonly transport: TransportClient,
  ) {}

  async route(event: InboundEvent, cid?: string): Promise<DispatchResult> {
    await this.observe(event.userId, cid);

    const result =
      event.type === 'button'
        ? await this.routeButton(event, cid)
        : await this.routeText(event, cid);

    this.log.route(result.outcome, { userId: event.userId, state: result.state }, cid);
    return result;
  }

  private async routeButton(
    event: ButtonPressEvent,
    cid?: string,
  ): Promise<DispatchResult> {
    this.acknowledge(event, cid);

    if (event.callbackId === REGISTER_BUTTON) {
      await this.states.set(event.userId, 'AWAITING_CONTACT');
      this.log.state('Awaiting contact', { userId: event.userId }, cid);
      return {
        outcome: 'register_started',
        replies: [this.catalog.registerReply()],
        state: 'AWAITING_CONTACT',
      };
    }

    const state = await this.states.get(event.userId);
    const key = this.catalog.resolveKey(event.callbackId);
    const reply = key ? this.catalog.lookup(key) : null;

    if (reply) {
      return { outcome: 'button_reply', replies: [reply], state };
    }

    return {
      outcome: 'unknown_option',
      replies: [Replies.unknownOption(event.callbackId)],
      state,
    };
  }

  private async routeText(
    event: TextMessageEvent,
    cid?: string,
  ): Promise<DispatchResult> {
    if (event.rawText === START_COMMAND) {
      await this.states.clear(event.userId);
      return { outcome: 'start', replies: [this.catalog.startReply()], state: 'NONE' };
    }

    const state = await this.states.get(event.userId);
    if (state === 'AWAITING_CONTACT') {
      return this.captureContact(event, cid);
    }

    const key = this.catalog.resolveKey(event.rawText);
    const reply = key ? this.catalog.lookup(key) : null;
    if (reply) {
      return { outcome: 'catalog_reply', replies: [reply], state };
    }

    return { outcome: 'unrecognized', replies: [Replies.unrecognized], state };
  }

  /**
   * Text received while AWAITING_CONTACT. The state only changes on a stored contact;
   * invalid input and storage failures keep the user in the capture flow.
   */
  private async captureContact(
    event: TextMessageEvent,
    cid?: string,
  ): Promise<DispatchResult> {
    const parsed = validateContact(event.rawText);
    if (!parsed.valid) {
      this.log.warn('Invalid contact line', { userId: event.userId, reason: parsed.reason }, cid);
      return {
        outcome: 'contact_invalid',
        replies: [Replies.invalidContactFormat],
        state: 'AWAITING_CONTACT',
      };
    }

    const contact: ContactRecord = {
      userId: event.userId,
      name: parsed.name,
      phoneNumber: parsed.phone,
      capturedAt: new Date().toISOString(),
    };

    try {
      await this.storage.persistContact(contact);
    } catch (err) {
      this.log.err('Contact not stored', { userId: event.userId, error: describeError(err) }, cid);
      return {
        outcome: 'contact_error',
        replies: [Replies.registrationError],
        state: 'AWAITING_CONTACT',
      };
    }

    await this.states.clear(event.userId);
    this.log.state('Contact stored, state cleared', { userId: event.userId }, cid);

    return {
      outcome: 'contact_saved',
      replies: [
        Replies.contactSaved(contact.name, contact.phoneNumber),
        this.catalog.startReply(),
      ],
      state: 'NONE',
      contact,
    };
  }

  private async observe(userId: string, cid?: string): Promise<void> {
    try {
      await this.storage.observeUserId(userId);
    } catch (err) {
      this.log.warn('Could not record user id', { userId, error: describeError(err) }, cid);
    }
  }

  /**
   * Clears the button's loading state. Fire and forget.
   */
  private acknowledge(event: ButtonPressEvent, cid?: string): void {
    this.transport.acknowledgeCallback(event.callbackQueryId).catch((err: unknown) => {
      this.log.warn('Callback acknowledgement failed', { callbackQueryId: event.callbackQueryId, error: describeError(err) }, cid);
    });
  }
}
