import { ReplyDescriptor } from '../contracts';

export const START_COMMAND = '/start';
export const REGISTER_BUTTON = 'Register';
export const FINAL_KEY = 'final_action';

/**
 * Key space of the catalog. Raw text and callback ids are classified into
 * one of these before lookup.
 */
export type CatalogKey =
  | { kind: 'command'; command: typeof START_COMMAND }
  | { kind: 'button'; label: string }
  | { kind: 'state'; name: string }
  | { kind: 'final' };

export interface CatalogDefinition {
  start: ReplyDescriptor;
  buttons: Record<string, ReplyDescriptor>;
  states: Record<string, ReplyDescriptor>;
  final: ReplyDescriptor;
}

function freezeReply(reply: ReplyDescriptor): ReplyDescriptor {
  return Object.freeze({
    ...reply,
    ...(reply.buttons !== undefined && {
      buttons: Object.freeze([...reply.buttons]),
    }),
    ...(reply.media !== undefined && { media: Object.freeze({ ...reply.media }) }),
  });
}

function freezeAll(
  source: Record<string, ReplyDescriptor>,
): ReadonlyMap<string, ReplyDescriptor> {
  return new Map(
    Object.entries(source).map(([key, reply]) => [key, freezeReply(reply)]),
  );
}

/**
 * Static mapping from catalog keys to reply descriptors.
 *
 * Built once from a definition and never mutated afterwards. Matching is exact:
 * no case folding, no trimming, no locale handling. When the same string is
 * used by several key kinds, the command wins over buttons, buttons over
 * states, and states over the final key.
 */
export class ResponseCatalog {
  private readonly start: ReplyDescriptor;
  private readonly buttons: ReadonlyMap<string, ReplyDescriptor>;
  private readonly states: ReadonlyMap<string, ReplyDescriptor>;
  private readonly final: ReplyDescriptor;

  constructor(definition: CatalogDefinition) {
    if (!(REGISTER_BUTTON in definition.buttons)) {
      throw new Error(`Catalog must define the "${REGISTER_BUTTON}" button`);
    }

    this.start = freezeReply(definition.start);
    this.buttons = freezeAll(definition.buttons);
    this.states = freezeAll(definition.states);
    this.final = freezeReply(definition.final);
  }

  /**
   * Classifies a raw text or callback id, or returns null when it is not a key.
   */
  resolveKey(raw: string): CatalogKey | null {
    if (raw === START_COMMAND) return { kind: 'command', command: START_COMMAND };
    if (this.buttons.has(raw)) return { kind: 'button', label: raw };
    if (this.states.has(raw)) return { kind: 'state', name: raw };
    if (raw === FINAL_KEY) return { kind: 'final' };
    return null;
  }

  lookup(key: CatalogKey): ReplyDescriptor | null {
    switch (key.kind) {
      case 'command':
        return this.start;
      case 'button':
        return this.buttons.get(key.label) ?? null;
      case 'state':
        return this.states.get(key.name) ?? null;
      case 'final':
        return this.final;
    }
  }

  /** Reply to the start/reset command. */
  startReply(): ReplyDescriptor {
    return this.start;
  }

  /** Reply that opens the contact capture flow. */
  registerReply(): ReplyDescriptor {
    const reply = this.buttons.get(REGISTER_BUTTON);
    if (!reply) {
      throw new Error(`Catalog is missing the "${REGISTER_BUTTON}" button`);
    }
    return reply;
  }

  keys(): string[] {
    return [START_COMMAND, ...this.buttons.keys(), ...this.states.keys(), FINAL_KEY];
  }
}
