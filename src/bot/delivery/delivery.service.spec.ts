import { DeliveryService } from './delivery.service';
import { DelayedSendScheduler } from './delayed-send.scheduler';
import { MediaNotFoundError, TransportError } from '../adapters/transport.errors';
import { FakeTransport, testSettings } from '../__fixtures__/fakes';

describe('DeliveryService', () => {
  let transport: FakeTransport;
  let scheduler: DelayedSendScheduler;
  let delivery: DeliveryService;

  beforeEach(() => {
    jest.useFakeTimers();
    transport = new FakeTransport();
    scheduler = new DelayedSendScheduler(transport);
    delivery = new DeliveryService(
      transport,
      scheduler,
      testSettings({ followUpDelayMs: 3000 }),
    );
  });

  afterEach(() => {
    scheduler.onModuleDestroy();
    jest.useRealTimers();
  });

  it('sends text with its buttons', async () => {
    const outcome = await delivery.deliver('42', { text: 'Pick one', buttons: ['A', 'B'] });

    expect(outcome).toEqual({ status: 'sent' });
    expect(transport.texts).toEqual([{ userId: '42', text: 'Pick one', buttons: ['A', 'B'] }]);
  });

  it('sends media with the text as caption', async () => {
    const outcome = await delivery.deliver('42', {
      text: 'Our brochure',
      media: { kind: 'document', path: 'brochure.pdf' },
    });

    expect(outcome).toEqual({ status: 'sent' });
    expect(transport.media).toEqual([
      { userId: '42', media: { kind: 'document', path: 'brochure.pdf' }, caption: 'Our brochure' },
    ]);
    expect(transport.texts).toEqual([]);
  });

  it('never sends an empty reply', async () => {
    const outcome = await delivery.deliver('42', { buttons: ['A'] });

    expect(outcome).toEqual({ status: 'skipped', reason: 'empty_descriptor' });
    expect(transport.texts).toEqual([]);
  });

  it('replaces missing media by one text warning', async () => {
    transport.mediaErrors.push(new MediaNotFoundError('intro.png', '/srv/media/intro.png'));

    const outcome = await delivery.deliver('42', {
      text: 'Welcome',
      media: { kind: 'photo', path: 'intro.png' },
      followUpText: 'later',
    });

    expect(outcome).toEqual({ status: 'fallback_sent', missingResource: 'intro.png' });
    expect(transport.texts).toEqual([
      {
        userId: '42',
        text: '⚠️ Media file not found for `intro.png`. Welcome',
        buttons: [],
      },
    ]);
    expect(scheduler.pendingCount()).toBe(0);
  });

  it('stops after a failed fallback', async () => {
    transport.mediaErrors.push(new MediaNotFoundError('intro.png', '/srv/media/intro.png'));
    transport.textErrors.push(new TransportError('sendMessage', 'Bad Request', 400));

    const outcome = await delivery.deliver('42', {
      media: { kind: 'photo', path: 'intro.png' },
    });

    expect(outcome).toEqual({ status: 'failed', stage: 'fallback', error: 'Bad Request' });
    expect(transport.texts).toEqual([]);
    expect(transport.media).toEqual([]);
  });

  it('drops a reply whose media upload failed for another reason', async () => {
    transport.mediaErrors.push(new TransportError('sendPhoto', 'Request Entity Too Large', 413));

    const outcome = await delivery.deliver('42', {
      text: 'Big picture',
      media: { kind: 'photo', path: 'big.png' },
    });

    expect(outcome).toEqual({
      status: 'failed',
      stage: 'media',
      error: 'Request Entity Too Large',
    });
    expect(transport.texts).toEqual([]);
  });

  it('drops a reply whose text send failed', async () => {
    transport.textErrors.push(new TransportError('sendMessage', 'Forbidden: bot was blocked', 403));

    const outcome = await delivery.deliver('42', { text: 'Hi', followUpText: 'later' });

    expect(outcome).toEqual({
      status: 'failed',
      stage: 'text',
      error: 'Forbidden: bot was blocked',
    });
    expect(scheduler.pendingCount()).toBe(0);
  });

  it('schedules the follow-up after the primary send', async () => {
    const outcome = await delivery.deliver('42', {
      text: 'Thank you for your answer!',
      followUpText: 'Here is a follow-up message after a short delay.',
    });

    expect(outcome.status).toBe('sent');
    expect(transport.texts).toHaveLength(1);

    const followUp = outcome.status === 'sent' ? outcome.followUp : undefined;
    expect(followUp?.state).toBe('pending');

    jest.advanceTimersByTime(2999);
    expect(transport.texts).toHaveLength(1);

    jest.advanceTimersByTime(1);
    expect(await followUp?.settled).toBe('sent');
    expect(transport.texts[1]).toEqual({
      userId: '42',
      text: 'Here is a follow-up message after a short delay.',
      buttons: [],
    });
  });

  it('keeps the sent outcome when the follow-up fails later', async () => {
    const outcome = await delivery.deliver('42', {
      text: 'Thank you for your answer!',
      followUpText: 'Here is a follow-up message after a short delay.',
    });
    transport.textErrors.push(new TransportError('sendMessage', 'Too Many Requests', 429));

    jest.advanceTimersByTime(3000);

    const followUp = outcome.status === 'sent' ? outcome.followUp : undefined;
    expect(outcome).toEqual({ status: 'sent', followUp });
    expect(followUp).toBeDefined();
    expect(await followUp?.settled).toBe('failed');
    expect(transport.texts).toEqual([
      { userId: '42', text: 'Thank you for your answer!', buttons: [] },
    ]);
  });
});
