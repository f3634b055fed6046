import {
  CatalogDefinition,
  FINAL_KEY,
  REGISTER_BUTTON,
  ResponseCatalog,
  START_COMMAND,
} from './response-catalog';
import { DEFAULT_CATALOG } from './default-catalog';
import { Replies, escapeMarkdown } from './replies';

describe('ResponseCatalog', () => {
  const catalog = new ResponseCatalog(DEFAULT_CATALOG);

  it('classifies the start command, buttons, states and the final key', () => {
    expect(catalog.resolveKey(START_COMMAND)).toEqual({ kind: 'command', command: '/start' });
    expect(catalog.resolveKey('Option A')).toEqual({ kind: 'button', label: 'Option A' });
    expect(catalog.resolveKey('sequential_step_2')).toEqual({
      kind: 'state',
      name: 'sequential_step_2',
    });
    expect(catalog.resolveKey(FINAL_KEY)).toEqual({ kind: 'final' });
  });

  it('matches exactly', () => {
    expect(catalog.resolveKey('option a')).toBeNull();
    expect(catalog.resolveKey(' Option A')).toBeNull();
    expect(catalog.resolveKey('xyz')).toBeNull();
  });

  it('looks up the start reply with its buttons', () => {
    expect(catalog.startReply()).toEqual({
      text: 'Hello! Welcome to the bot!\n\nWhat would you like to do?',
      buttons: ['Option A', 'Option B', 'Register'],
    });
  });

  it('returns the register reply', () => {
    expect(catalog.registerReply().text).toBe(
      'To register, please send your Name and Phone number in the format: *John +123456789012*',
    );
  });

  it('keeps the follow-up of a state entry', () => {
    const key = catalog.resolveKey('sequential_step_2');
    expect(key && catalog.lookup(key)?.followUpText).toBe(
      'Here is a follow-up message after a short delay.',
    );
  });

  it('prefers buttons over states when a string is both', () => {
    const overlapping = new ResponseCatalog({
      ...DEFAULT_CATALOG,
      states: { ...DEFAULT_CATALOG.states, 'Option A': { text: 'state text' } },
    });
    const key = overlapping.resolveKey('Option A');
    expect(key).toEqual({ kind: 'button', label: 'Option A' });
    expect(key && overlapping.lookup(key)?.text).toBe(
      'You chose Option A. This is the resulting message.',
    );
  });

  it('is not affected by later changes to its definition', () => {
    const definition: CatalogDefinition = {
      start: { text: 'hi', buttons: [REGISTER_BUTTON] },
      buttons: { [REGISTER_BUTTON]: { text: 'send contact' } },
      states: {},
      final: { text: 'bye' },
    };
    const built = new ResponseCatalog(definition);
    definition.buttons[REGISTER_BUTTON] = { text: 'changed' };

    expect(built.registerReply().text).toBe('send contact');
    expect(Object.isFrozen(built.startReply())).toBe(true);
  });

  it('requires a Register button', () => {
    expect(
      () =>
        new ResponseCatalog({
          start: { text: 'hi' },
          buttons: {},
          states: {},
          final: { text: 'bye' },
        }),
    ).toThrow('Catalog must define the "Register" button');
  });

  it('lists its keys in precedence order', () => {
    expect(catalog.keys()).toEqual([
      '/start',
      'Option A',
      'Option B',
      'Register',
      'AWAITING_CONTACT',
      'sequential_step_1',
      'sequential_step_2',
      'final_action',
    ]);
  });
});

describe('Replies', () => {
  it('escapes markdown in the saved contact name', () => {
    expect(Replies.contactSaved('J_o*e', '+123456789012').text).toBe(
      '✅ Information for *J\\_o\\*e* received and saved. Phone: `+123456789012`',
    );
  });

  it('builds the unknown option reply', () => {
    expect(Replies.unknownOption('xyz').text).toBe('Unknown option: `xyz`\n\nTry /start');
  });

  it('falls back to a placeholder when the missing media had no caption', () => {
    expect(Replies.missingMedia('intro.png').text).toBe(
      '⚠️ Media file not found for `intro.png`. Placeholder message.',
    );
    expect(Replies.missingMedia('intro.png', 'Welcome').text).toBe(
      '⚠️ Media file not found for `intro.png`. Welcome',
    );
  });

  it('leaves plain text untouched', () => {
    expect(escapeMarkdown('Jane')).toBe('Jane');
    expect(escapeMarkdown('[x]`y`')).toBe('\\[x]\\`y\\`');
  });
});
