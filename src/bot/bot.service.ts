import { Inject, Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { InboundEvent } from './contracts';
import { DispatchOutcome, DispatchRouter } from './router/dispatch-router.service';
import { DeliveryOutcome, DeliveryService } from './delivery/delivery.service';
import { DelayedSendScheduler } from './delivery/delayed-send.scheduler';
import { BOT_SETTINGS, BotSettings } from './bot.settings';
import { describeError } from './adapters/transport.errors';
import { debugLog } from '../common/utils/debug-logger';

export interface HandleResult {
  correlationId: string;
  outcome: DispatchOutcome | 'error';
  deliveries: DeliveryOutcome[];
}

/**
 * Entry point for one inbound event: route it, then deliver the replies in order.
 * Never throws; every failure ends as a log line.
 */
@Injectable()
export class BotService {
  private readonly log = debugLog.bot;

  constructor(
    private readonly router: DispatchRouter,
    private readonly delivery: DeliveryService,
    private readonly scheduler: DelayedSendScheduler,
    @Inject(BOT_SETTINGS) private readonly settings: BotSettings,
  ) {}

  async handle(event: InboundEvent): Promise<HandleResult> {
    const cid = randomUUID().substring(0, 8);
    const done = this.log.timer('Event handled', cid);

    this.log.separator(cid);
    this.log.recv(
      event.type === 'button' ? 'Button press' : 'Text message',
      {
        from: event.userId,
        ...(event.type === 'button'
          ? { callback: event.callbackId }
          : { text: event.rawText.substring(0, 50) }),
      },
      cid,
    );

    try {
      if (this.settings.cancelFollowUpsOnNewEvent) {
        this.scheduler.cancelForUser(event.userId, cid);
      }

      const dispatch = await this.router.route(event, cid);

      const deliveries: DeliveryOutcome[] = [];
      for (const reply of dispatch.replies) {
        deliveries.push(await this.delivery.deliver(event.userId, reply, cid));
      }

      this.log.ok('Dispatch complete', {
        outcome: dispatch.outcome,
        sent: deliveries.map((d) => d.status).join(','),
      }, cid);
      done();

      return { correlationId: cid, outcome: dispatch.outcome, deliveries };
    } catch (err) {
      this.log.err('Event handling failed', { error: describeError(err) }, cid);
      return { correlationId: cid, outcome: 'error', deliveries: [] };
    }
  }
}
