import { describe, expect, it } from 'vitest';
import { TextUtils } from '../../src/utils/text.js';

describe('TextUtils', () => {
  it('title-cases names typed in a single case and leaves mixed case alone', () => {
    expect(TextUtils.normalizeEntityName('  laptop   stand ')).toBe('Laptop Stand');
    expect(TextUtils.normalizeEntityName('USB HUB')).toBe('Usb Hub');
    expect(TextUtils.normalizeEntityName('iPad')).toBe('iPad');
    expect(TextUtils.normalizeEntityName('123')).toBe('123');
  });

  it('converts only non-empty strings and finite numbers to text', () => {
    expect(TextUtils.asText(0)).toBe('0');
    expect(TextUtils.asText('  x ')).toBe('x');
    expect(TextUtils.asText('  ')).toBeNull();
    expect(TextUtils.asText(true)).toBeNull();
    expect(TextUtils.asText(undefined)).toBeNull();
  });

  describe('extractEntityName', () => {
    it('prefers name-like keys', () => {
      expect(TextUtils.extractEntityName({ title: 'desk lamp', product: 'other' }, 'product')).toBe('Desk Lamp');
    });

    it('falls back to the entity-type key, then the description', () => {
      expect(TextUtils.extractEntityName({ product: 'chair' }, 'product')).toBe('Chair');
      expect(TextUtils.extractEntityName({ description: 'oak table, large' }, 'product')).toBe('Oak Table');
    });

    it('skips keys that never hold names', () => {
      expect(TextUtils.extractEntityName({ sku: 'X1', color: 'red' }, 'product')).toBe('Red');
      expect(TextUtils.extractEntityName({ price: 3 }, 'product')).toBe('Unknown product');
    });
  });

  it('extracts numbers, dropping thousands separators', () => {
    expect(TextUtils.extractNumbers('1,200 units at 3.5')).toEqual([1200, 3.5]);
  });

  it('extracts emails and phone numbers', () => {
    expect(TextUtils.extractEmails('write to ops@globex.test or sales@globex.test')).toEqual([
      'ops@globex.test',
      'sales@globex.test',
    ]);
    expect(TextUtils.extractPhones('call +1 555 010 9999 today')).toEqual(['+1 555 010 9999']);
  });

  it('formats lists and truncates text', () => {
    expect(TextUtils.formatList(['name', 'email', 'phone'])).toBe('name, email and phone');
    expect(TextUtils.formatList(['name'])).toBe('name');
    expect(TextUtils.truncate('abcdefghij', 8)).toBe('abcde...');
  });

  it('strips control characters before text goes to a model', () => {
    expect(TextUtils.cleanForLLM('a\u0007b\n\n c')).toBe('ab c');
  });
});
