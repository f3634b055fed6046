import { Inject, Injectable } from '@nestjs/common';
import { ReplyDescriptor, isDispatchable } from '../contracts';
import { TransportClient } from '../adapters/transport';
import { MediaNotFoundError, describeError } from '../adapters/transport.errors';
import { Replies } from '../catalog/replies';
import { BOT_SETTINGS, BotSettings } from '../bot.settings';
import { DelayedSendScheduler, ScheduledSend } from './delayed-send.scheduler';
import { debugLog } from '../../common/utils/debug-logger';

export type DeliveryOutcome =
  | { status: 'sent'; followUp?: ScheduledSend }
  | { status: 'fallback_sent'; missingResource: string }
  | { status: 'failed'; stage: 'media' | 'text' | 'fallback'; error: string }
  | { status: 'skipped'; reason: 'empty_descriptor' };

type SendResult =
  | { ok: true }
  | { ok: false; error: unknown; stage: 'media' | 'text' };

/**
 * Turns a reply descriptor into transport calls.
 *
 * One primary send per call: media with the text as caption, or text with its
 * buttons. A missing media file is replaced by a text-only warning; any other
 * failure is logged and the reply is dropped. A follow-up is scheduled only
 * after the primary send went through.
 */
@Injectable()
export class DeliveryService {
  private readonly log = debugLog.delivery;

  constructor(
    private readonly transport: TransportClient,
    private readonly scheduler: DelayedSendScheduler,
    @Inject(BOT_SETTINGS) private readonly settings: BotSettings,
  ) {}

  async deliver(
    userId: string,
    reply: ReplyDescriptor,
    cid?: string,
  ): Promise<DeliveryOutcome> {
    if (!isDispatchable(reply)) {
      this.log.warn('Refusing to send an empty reply', { userId }, cid);
      return { status: 'skipped', reason: 'empty_descriptor' };
    }

    const primary = await this.sendOnce(userId, reply, true);

    if (!primary.ok) {
      if (reply.media && primary.error instanceof MediaNotFoundError) {
        return this.sendMissingMediaWarning(userId, reply, primary.error, cid);
      }
      const error = describeError(primary.error);
      this.log.err('Send failed', { userId, stage: primary.stage, error }, cid);
      return { status: 'failed', stage: primary.stage, error };
    }

    this.log.send('Reply sent', { userId, text: reply.text, media: reply.media?.path }, cid);

    if (!reply.followUpText) {
      return { status: 'sent' };
    }

    const followUp = this.scheduler.scheduleDelayed(
      userId,
      reply.followUpText,
      this.settings.followUpDelayMs,
      cid,
    );
    return { status: 'sent', followUp };
  }

  private async sendMissingMediaWarning(
    userId: string,
    reply: ReplyDescriptor,
    missing: MediaNotFoundError,
    cid?: string,
  ): Promise<DeliveryOutcome> {
    this.log.warn('Media missing, sending text warning', { userId, file: missing.filePath }, cid);

    const warning = Replies.missingMedia(missing.resource, reply.text);
    const result = await this.sendOnce(userId, warning, false);
    if (!result.ok) {
      const error = describeError(result.error);
      this.log.err('Fallback send failed', { userId, error }, cid);
      return { status: 'failed', stage: 'fallback', error };
    }
    return { status: 'fallback_sent', missingResource: missing.resource };
  }

  /**
   * The one place a descriptor reaches the transport. With `allowMedia` false
   * the media reference is ignored, so the fallback path can never loop back
   * into a media upload.
   */
  private async sendOnce(
    userId: string,
    reply: ReplyDescriptor,
    allowMedia: boolean,
  ): Promise<SendResult> {
    if (allowMedia && reply.media) {
      try {
        await this.transport.sendMedia(userId, reply.media, reply.text ?? '');
        return { ok: true };
      } catch (error) {
        return { ok: false, error, stage: 'media' };
      }
    }

    try {
      await this.transport.sendText(userId, reply.text ?? '', reply.buttons ?? []);
      return { ok: true };
    } catch (error) {
      return { ok: false, error, stage: 'text' };
    }
  }
}
