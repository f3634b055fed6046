import { validateContact } from './contact-validator';

describe('validateContact', () => {
  it('accepts a name followed by a +12-digit phone', () => {
    expect(validateContact('John +123456789012')).toEqual({
      valid: true,
      name: 'John',
      phone: '+123456789012',
    });
  });

  it('splits only on the first whitespace run', () => {
    expect(validateContact('  Jane \t +987654321098')).toEqual({
      valid: true,
      name: 'Jane',
      phone: '+987654321098',
    });
  });

  it('rejects a phone without the leading +', () => {
    expect(validateContact('John 123456789012')).toEqual({
      valid: false,
      reason: 'phone',
    });
  });

  it('rejects a single token', () => {
    expect(validateContact('OnlyOneToken')).toEqual({
      valid: false,
      reason: 'shape',
    });
  });

  it('rejects a name followed only by whitespace', () => {
    expect(validateContact('John   ')).toEqual({ valid: false, reason: 'shape' });
  });

  it('rejects a phone that is too short', () => {
    expect(validateContact('John +12345')).toEqual({
      valid: false,
      reason: 'phone',
    });
  });

  it('rejects a phone that is too long', () => {
    expect(validateContact('John +1234567890123')).toEqual({
      valid: false,
      reason: 'phone',
    });
  });

  it('rejects a letter in a phone of the right length', () => {
    expect(validateContact('John +12345678901a')).toEqual({
      valid: false,
      reason: 'phone',
    });
  });

  it('rejects a two-word name because the remainder is not a phone', () => {
    expect(validateContact('John Smith +123456789012')).toEqual({
      valid: false,
      reason: 'phone',
    });
  });

  it('rejects trailing whitespace after the phone', () => {
    expect(validateContact('John +123456789012 ').valid).toBe(false);
  });

  it('rejects non-ASCII digits', () => {
    expect(validateContact('John +١٢٣٤٥٦٧٨٩٠١٢').valid).toBe(false);
  });

  it('rejects the empty string', () => {
    expect(validateContact('')).toEqual({ valid: false, reason: 'shape' });
  });
});
