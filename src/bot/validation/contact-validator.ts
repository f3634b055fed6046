/**
 * Parses the "Name +123456789012" line sent while a user is registering.
 *
 * The line is split on its first whitespace run (leading whitespace ignored);
 * both parts must be non-empty. The phone part is kept verbatim and must be
 * `+` followed by exactly 12 ASCII digits.
 */

const CONTACT_LINE = /^\s*(\S+)\s+(\S[\s\S]*)$/;
const PHONE_PATTERN = /^\+[0-9]{12}$/;

export type ContactValidation =
  | { valid: true; name: string; phone: string }
  | { valid: false; reason: 'shape' | 'phone' };

export function validateContact(rawText: string): ContactValidation {
  const parts = CONTACT_LINE.exec(rawText);
  if (!parts) {
    return { valid: false, reason: 'shape' };
  }

  const [, name, phone] = parts;
  if (!PHONE_PATTERN.test(phone)) {
    return { valid: false, reason: 'phone' };
  }

  return { valid: true, name, phone };
}
