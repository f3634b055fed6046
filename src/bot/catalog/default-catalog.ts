import { CatalogDefinition } from './response-catalog';

export const DEFAULT_CATALOG: CatalogDefinition = {
  start: {
    text: 'Hello! Welcome to the bot!\n\nWhat would you like to do?',
    buttons: ['Option A', 'Option B', 'Register'],
  },
  buttons: {
    'Option A': { text: 'You chose Option A. This is the resulting message.' },
    'Option B': { text: 'You chose Option B. This is the resulting message.' },
    Register: {
      text: 'To register, please send your Name and Phone number in the format: *John +123456789012*',
    },
  },
  states: {
    AWAITING_CONTACT: {
      text: "Thank you, I'm expecting your contact details now. Format: Name +PhoneNumber",
    },
    sequential_step_1: {
      text: 'Answer the first question:',
      buttons: ['Yes', 'No'],
    },
    sequential_step_2: {
      text: 'Thank you for your answer!',
      followUpText: 'Here is a follow-up message after a short delay.',
    },
  },
  final: {
    text: 'Test completed. Join our channel: [Link](https://t.me/example)',
  },
};
