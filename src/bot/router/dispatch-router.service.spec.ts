import { DispatchRouter } from './dispatch-router.service';
import { ResponseCatalog } from '../catalog/response-catalog';
import { DEFAULT_CATALOG } from '../catalog/default-catalog';
import { Replies } from '../catalog/replies';
import { InMemoryConversationStateStore } from '../state/conversation-state.store';
import { ButtonPressEvent, TextMessageEvent } from '../contracts';
import { FakeStorage, FakeTransport } from '../__fixtures__/fakes';

const text = (rawText: string, userId = '42'): TextMessageEvent => ({
  type: 'text',
  userId,
  rawText,
});

const press = (callbackId: string, userId = '42'): ButtonPressEvent => ({
  type: 'button',
  userId,
  callbackId,
  callbackQueryId: `cq-${callbackId}`,
});

describe('DispatchRouter', () => {
  const catalog = new ResponseCatalog(DEFAULT_CATALOG);
  let states: InMemoryConversationStateStore;
  let storage: FakeStorage;
  let transport: FakeTransport;
  let router: DispatchRouter;

  beforeEach(() => {
    states = new InMemoryConversationStateStore();
    storage = new FakeStorage();
    transport = new FakeTransport();
    router = new DispatchRouter(catalog, states, storage, transport);
  });

  describe('/start', () => {
    it('greets with the start reply and no pending state', async () => {
      const result = await router.route(text('/start'));

      expect(result.outcome).toBe('start');
      expect(result.replies).toEqual([catalog.startReply()]);
      expect(await states.get('42')).toBe('NONE');
    });

    it('gives the same answer when repeated', async () => {
      const first = await router.route(text('/start'));
      const second = await router.route(text('/start'));
      expect(second).toEqual(first);
    });

    it('resets a user in the middle of contact capture', async () => {
      await states.set('42', 'AWAITING_CONTACT');
      const result = await router.route(text('/start'));

      expect(result.outcome).toBe('start');
      expect(result.state).toBe('NONE');
      expect(await states.get('42')).toBe('NONE');
    });
  });

  it('records every user id it sees', async () => {
    await router.route(text('hello', '1'));
    await router.route(press('Option A', '2'));
    expect([...storage.observed]).toEqual(['1', '2']);
  });

  it('keeps routing when the user id cannot be recorded', async () => {
    storage.observeError = new Error('insert failed');
    const result = await router.route(text('/start'));
    expect(result.outcome).toBe('start');
  });

  describe('button presses', () => {
    it('opens contact capture on Register', async () => {
      const result = await router.route(press('Register'));

      expect(result.outcome).toBe('register_started');
      expect(result.replies).toEqual([catalog.registerReply()]);
      expect(result.state).toBe('AWAITING_CONTACT');
      expect(await states.get('42')).toBe('AWAITING_CONTACT');
    });

    it('answers a catalog button', async () => {
      const result = await router.route(press('Option B'));

      expect(result.outcome).toBe('button_reply');
      expect(result.replies[0].text).toBe('You chose Option B. This is the resulting message.');
    });

    it('reports an unknown option', async () => {
      const result = await router.route(press('xyz'));

      expect(result.outcome).toBe('unknown_option');
      expect(result.replies).toEqual([{ text: 'Unknown option: `xyz`\n\nTry /start' }]);
    });

    it('acknowledges the press', async () => {
      await router.route(press('Option A'));
      expect(transport.acks).toEqual(['cq-Option A']);
    });

    it('still routes when the acknowledgement fails', async () => {
      transport.ackError = new Error('query is too old');
      const result = await router.route(press('Option A'));
      expect(result.outcome).toBe('button_reply');
    });
  });

  describe('contact capture', () => {
    beforeEach(async () => {
      await router.route(press('Register'));
    });

    it('stores a valid contact and returns to the start menu', async () => {
      const result = await router.route(text('Jane +987654321098'));

      expect(result.outcome).toBe('contact_saved');
      expect(result.replies).toEqual([
        Replies.contactSaved('Jane', '+987654321098'),
        catalog.startReply(),
      ]);
      expect(result.state).toBe('NONE');
      expect(await states.get('42')).toBe('NONE');
      expect(storage.contacts).toHaveLength(1);
      expect(storage.contacts[0]).toMatchObject({
        userId: '42',
        name: 'Jane',
        phoneNumber: '+987654321098',
      });
    });

    it.each(['John 123456789012', 'OnlyOneToken', 'John +12345', ''])(
      'asks again for %j and stays in capture',
      async (raw) => {
        const first = await router.route(text(raw));
        const second = await router.route(text(raw));

        expect(first.outcome).toBe('contact_invalid');
        expect(first.replies).toEqual([Replies.invalidContactFormat]);
        expect(second).toEqual(first);
        expect(await states.get('42')).toBe('AWAITING_CONTACT');
        expect(storage.contacts).toHaveLength(0);
      },
    );

    it('keeps the user in capture when the contact cannot be stored', async () => {
      storage.persistError = new Error('connection reset');
      const result = await router.route(text('Jane +987654321098'));

      expect(result.outcome).toBe('contact_error');
      expect(result.replies).toEqual([Replies.registrationError]);
      expect(await states.get('42')).toBe('AWAITING_CONTACT');
    });

    it('does not touch other users', async () => {
      const other = await router.route(text('Jane +987654321098', '7'));
      expect(other.outcome).toBe('unrecognized');
      expect(await states.get('42')).toBe('AWAITING_CONTACT');
    });
  });

  it('answers text equal to a catalog key', async () => {
    const result = await router.route(text('final_action'));

    expect(result.outcome).toBe('catalog_reply');
    expect(result.replies[0].text).toBe(
      'Test completed. Join our channel: [Link](https://t.me/example)',
    );
  });

  it('falls back for anything else', async () => {
    const result = await router.route(text('what is this'));

    expect(result.outcome).toBe('unrecognized');
    expect(result.replies).toEqual([Replies.unrecognized]);
    expect(result.state).toBe('NONE');
  });
});
