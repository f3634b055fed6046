import { MediaRef } from '../contracts';

/**
 * Outbound side of the messaging API. Every method performs one attempt and
 * rejects on failure (TransportError, or MediaNotFoundError for a missing file).
 */
export abstract class TransportClient {
  abstract sendText(
    userId: string,
    text: string,
    buttons?: readonly string[],
  ): Promise<void>;

  abstract sendMedia(userId: string, media: MediaRef, caption: string): Promise<void>;

  abstract acknowledgeCallback(callbackQueryId: string): Promise<void>;
}
