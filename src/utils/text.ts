import type { DataRecord, JsonValue } from '../types/index.js';

/**
 * Text utilities for entity names, identifiers and free-text replies
 */

const NAME_KEYS = ['name', 'title', 'label', 'identifier'] as const;

/** Keys that never hold a display name. */
const NON_NAME_KEYS = new Set([
  'id',
  'quantity',
  'qty',
  'price',
  'unit_price',
  'sale_price',
  'purchase_price',
  'amount',
  'total',
  'description',
  'sku',
  'email',
  'phone',
]);

const MAX_DESCRIPTION_NAME_LENGTH = 50;

export class TextUtils {
  /**
   * Normalize text for comparison
   */
  static normalize(text: string): string {
    return text.toLowerCase().trim().replace(/\s+/g, ' ');
  }

  /**
   * Upper-case the first letter of every word
   */
  static titleCase(text: string): string {
    return text.toLowerCase().replace(/(^|\s)(\S)/g, (_match, space: string, letter: string) => space + letter.toUpperCase());
  }

  /**
   * Trim, collapse whitespace, and title-case names typed entirely in one case.
   * Mixed-case names ("iPad", "MacBook") are left alone.
   */
  static normalizeEntityName(name: string): string {
    const collapsed = name.trim().replace(/\s+/g, ' ');
    if (!/[a-z]/i.test(collapsed)) return collapsed;

    const allLower = collapsed === collapsed.toLowerCase();
    const allUpper = collapsed === collapsed.toUpperCase();
    return allLower || allUpper ? this.titleCase(collapsed) : collapsed;
  }

  /**
   * A non-empty trimmed string for strings and finite numbers, otherwise null
   */
  static asText(value: JsonValue | undefined): string | null {
    if (typeof value === 'string') {
      const trimmed = value.trim();
      return trimmed === '' ? null : trimmed;
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
      return String(value);
    }
    return null;
  }

  /**
   * Best display name for a loosely structured item.
   * Order: name-like keys, the entity-type key, the first segment of a description,
   * any other string value, then "Unknown {type}".
   */
  static extractEntityName(item: DataRecord, entityType: string): string {
    for (const key of NAME_KEYS) {
      const value = this.asText(item[key]);
      if (value) return this.normalizeEntityName(value);
    }

    const typed = this.asText(item[entityType]);
    if (typed) return this.normalizeEntityName(typed);

    const description = this.asText(item.description);
    if (description) {
      const firstSegment = description.split(/[,.;\n]/)[0].trim();
      if (firstSegment) {
        return this.normalizeEntityName(firstSegment.slice(0, MAX_DESCRIPTION_NAME_LENGTH));
      }
    }

    for (const [key, value] of Object.entries(item)) {
      if (NON_NAME_KEYS.has(key) || typeof value !== 'string') continue;
      const text = value.trim();
      if (text) return this.normalizeEntityName(text);
    }

    return `Unknown ${entityType}`;
  }

  /**
   * Extract email addresses from text
   */
  static extractEmails(text: string): string[] {
    return text.match(/[\w.+-]+@[\w-]+(\.[\w-]+)+/g) ?? [];
  }

  /**
   * Extract phone numbers (7+ digits, optional leading +) from text
   */
  static extractPhones(text: string): string[] {
    return (text.match(/\+?\d[\d\s().-]{6,}\d/g) ?? []).map((phone) => phone.trim());
  }

  /**
   * Extract numbers (integers or decimals) from text
   */
  static extractNumbers(text: string): number[] {
    const matches = text.replace(/(\d),(\d{3})/g, '$1$2').match(/\d+(?:\.\d+)?/g);
    return matches ? matches.map((n) => Number(n)) : [];
  }

  /**
   * Truncate text to max length
   */
  static truncate(text: string, maxLength: number, suffix: string = '...'): string {
    if (text.length <= maxLength) return text;
    return text.substring(0, maxLength - suffix.length) + suffix;
  }

  /**
   * Join items as "a, b and c"
   */
  static formatList(items: string[]): string {
    if (items.length === 0) return '';
    if (items.length === 1) return items[0];
    return `${items.slice(0, -1).join(', ')} and ${items[items.length - 1]}`;
  }

  /**
   * Clean text for LLM processing
   */
  static cleanForLLM(text: string): string {
    return text
      .replace(/[\u0000-\u001F\u007F-\u009F]/g, '') // Remove control characters
      .replace(/\s+/g, ' ')
      .trim();
  }
}
