import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { TransportClient } from '../adapters/transport';
import { describeError } from '../adapters/transport.errors';
import { debugLog } from '../../common/utils/debug-logger';

export type ScheduledSendState = 'pending' | 'sent' | 'failed' | 'cancelled';

/**
 * Handle to a follow-up that fires on its own timer.
 */
export interface ScheduledSend {
  readonly id: string;
  readonly userId: string;
  readonly dueAt: Date;
  readonly state: ScheduledSendState;
  /** Resolves with the final state once the send ran or was cancelled. */
  readonly settled: Promise<ScheduledSendState>;
  /** Returns false when the send already fired or was cancelled. */
  cancel(): boolean;
}

class DelayedSend implements ScheduledSend {
  readonly id = randomUUID().substring(0, 8);
  readonly dueAt: Date;
  readonly settled: Promise<ScheduledSendState>;
  timer: NodeJS.Timeout | null = null;
  private current: ScheduledSendState = 'pending';
  private resolveSettled: (state: ScheduledSendState) => void = () => undefined;

  constructor(
    readonly userId: string,
    readonly text: string,
    delayMs: number,
    private readonly onCancel: (send: DelayedSend) => void,
  ) {
    this.dueAt = new Date(Date.now() + delayMs);
    this.settled = new Promise((resolve) => {
      this.resolveSettled = resolve;
    });
  }

  get state(): ScheduledSendState {
    return this.current;
  }

  settle(state: Exclude<ScheduledSendState, 'pending'>) {
    if (this.current !== 'pending') return;
    this.current = state;
    this.resolveSettled(state);
  }

  cancel(): boolean {
    // timer is cleared once the send has started
    if (this.current !== 'pending' || this.timer === null) return false;
    this.onCancel(this);
    return true;
  }
}

/**
 * Fires one outbound text after a delay, off the caller's control flow.
 *
 * scheduleDelayed returns as soon as the timer is armed. The send is attempted
 * once; a failure is logged and the originating request never hears about it.
 */
@Injectable()
export class DelayedSendScheduler implements OnModuleDestroy {
  private readonly log = debugLog.scheduler;
  private readonly pending = new Map<string, DelayedSend>();

  constructor(private readonly transport: TransportClient) {}

  scheduleDelayed(userId: string, text: string, delayMs: number, cid?: string): ScheduledSend {
    const send = new DelayedSend(userId, text, delayMs, (s) => this.cancelSend(s, cid));
    send.timer = setTimeout(() => {
      send.timer = null;
      void this.fire(send, cid);
    }, delayMs);

    this.pending.set(send.id, send);
    this.log.delay('Follow-up scheduled', { id: send.id, userId, delayMs }, cid);
    return send;
  }

  /**
   * Cancels every pending follow-up for one user. Returns how many were cancelled.
   */
  cancelForUser(userId: string, cid?: string): number {
    let cancelled = 0;
    for (const send of [...this.pending.values()]) {
      if (send.userId === userId && send.cancel()) {
        cancelled++;
      }
    }
    if (cancelled > 0) {
      this.log.delay('Stale follow-ups cancelled', { userId, cancelled }, cid);
    }
    return cancelled;
  }

  pendingCount(): number {
    return this.pending.size;
  }

  onModuleDestroy() {
    for (const send of [...this.pending.values()]) {
      send.cancel();
    }
  }

  private cancelSend(send: DelayedSend, cid?: string) {
    if (send.timer) {
      clearTimeout(send.timer);
      send.timer = null;
    }
    this.pending.delete(send.id);
    send.settle('cancelled');
    this.log.state('Follow-up cancelled', { id: send.id, userId: send.userId }, cid);
  }

  private async fire(send: DelayedSend, cid?: string): Promise<void> {
    this.pending.delete(send.id);
    try {
      await this.transport.sendText(send.userId, send.text);
      send.settle('sent');
      this.log.send('Follow-up sent', { id: send.id, userId: send.userId }, cid);
    } catch (err) {
      send.settle('failed');
      this.log.err('Follow-up failed', { id: send.id, userId: send.userId, error: describeError(err) }, cid);
    }
  }
}
