import type { ResolutionConfig } from '../../types/index.js';

export interface FriendlyName {
  singular: string;
  plural: string;
}

const VOWELS = new Set(['a', 'e', 'i', 'o', 'u']);

/**
 * Presentation names for resolved fields ("customer_id" -> customer / customers).
 * One instance per engine; entries live as long as the engine does.
 */
export class FriendlyNames {
  private readonly cache = new Map<string, FriendlyName>();

  constructor(private readonly overrides: Record<string, FriendlyName> = {}) {}

  /**
   * Friendly name for a field, honouring the config's presentation hints.
   */
  forField(field: string, config?: Pick<ResolutionConfig, 'friendlyName' | 'displayName'>): FriendlyName {
    const hint = config?.friendlyName ?? config?.displayName;
    const key = hint ? `${field}::${hint}` : field;

    const cached = this.cache.get(key);
    if (cached) return cached;

    const name = this.build(hint ?? field);
    this.cache.set(key, name);
    return name;
  }

  get size(): number {
    return this.cache.size;
  }

  clear(): void {
    this.cache.clear();
  }

  private build(raw: string): FriendlyName {
    const base = raw
      .trim()
      .replace(/_ids?$/i, '')
      .replace(/_/g, ' ')
      .toLowerCase();

    const override = this.overrides[base];
    if (override) return override;

    // Field names like "products" are already plural
    const singular = base.endsWith('s') && !base.endsWith('ss') ? base.slice(0, -1) : base;
    const plural = base.endsWith('s') && !base.endsWith('ss') ? base : FriendlyNames.pluralize(base);
    return { singular, plural };
  }

  static pluralize(word: string): string {
    if (word.length === 0) return word;

    const last = word.slice(-1);
    const beforeLast = word.slice(-2, -1);

    if (last === 's' && !word.endsWith('ss')) return word;
    if (last === 'y' && beforeLast !== '' && !VOWELS.has(beforeLast)) {
      return `${word.slice(0, -1)}ies`;
    }
    if (/(ss|sh|ch|x|z)$/.test(word)) return `${word}es`;
    if (word.endsWith('fe')) return `${word.slice(0, -2)}ves`;
    if (last === 'f') return `${word.slice(0, -1)}ves`;
    return `${word}s`;
  }

  /**
   * Capitalize the first letter for sentence starts
   */
  static capitalize(text: string): string {
    return text.charAt(0).toUpperCase() + text.slice(1);
  }
}
