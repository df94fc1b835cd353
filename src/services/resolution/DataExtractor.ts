import { z } from 'zod';
import type { DataRecord, JsonValue } from '../../types/index.js';
import { DataRecordSchema } from '../../types/schema.js';
import { errorMeta, logger } from '../../utils/logger.js';
import { TextUtils } from '../../utils/text.js';
import { completeJson, type TextCompleter } from '../ai/TextCompleter.js';

export interface ItemFieldNames {
  identifierField: string;
  quantityField: string;
  priceField?: string;
}

export type FieldType = 'text' | 'number' | 'email' | 'phone';

export interface FieldSpec {
  name: string;
  type: FieldType;
  label?: string;
  required?: boolean;
}

const REPLACE_PATTERN = /\b(?:replace|swap|change)\s+(.+?)\s+(?:with|to|for)\s+(.+)$/i;
const FILLER_PATTERN = /\b(?:actually|instead|rather|i meant|i mean|i want|make it|change it to|it should be|add)\b/gi;
const PRICE_PATTERN = /(?:@|\bat\b|\bfor\b|\bprice\b\s*[:=]?|\beach\b)\s*\$?\s*(\d+(?:\.\d+)?)|\$\s*(\d+(?:\.\d+)?)/i;
const LEADING_QUANTITY_PATTERN = /^(\d+)\s*(?:x\b|pcs\b|pieces?\b|items?\b|units?\b)?\s*/i;
const INLINE_QUANTITY_PATTERN = /\b(?:x|qty|quantity)\s*[:=]?\s*(\d+)\b|\b(\d+)\s*x\b/i;
const ITEM_SEPARATOR = /\s*(?:,|;|\n|\band\b|&)\s*/i;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function coerce(raw: string, type: FieldType): JsonValue | null {
  const value = raw.trim().replace(/[.!]+$/, '');
  if (!value) return null;

  switch (type) {
    case 'number': {
      const [number] = TextUtils.extractNumbers(value);
      return number === undefined ? null : number;
    }
    case 'email':
      return TextUtils.extractEmails(value)[0] ?? null;
    case 'phone':
      return TextUtils.extractPhones(value)[0] ?? null;
    default:
      return value;
  }
}

/**
 * Turns free text into structured items and field values.
 * The heuristic path is always available; a completer, when given, is tried first
 * and its answers are validated before use.
 */
export class DataExtractor {
  constructor(private readonly completer?: TextCompleter) {}

  // ==========================================================================
  // ITEMS
  // ==========================================================================

  /**
   * "2 laptops at $1500" -> { name: "Laptops", quantity: 2, price: 1500 }
   */
  static parseItem(text: string, names: ItemFieldNames): DataRecord {
    let rest = text.trim();
    const item: DataRecord = {};

    const price = rest.match(PRICE_PATTERN);
    if (price) {
      item[names.priceField ?? 'price'] = Number(price[1] ?? price[2]);
      rest = rest.replace(price[0], ' ');
    }

    const leading = rest.match(LEADING_QUANTITY_PATTERN);
    const inline = rest.match(INLINE_QUANTITY_PATTERN);
    if (leading) {
      item[names.quantityField] = Number(leading[1]);
      rest = rest.slice(leading[0].length);
    } else if (inline) {
      item[names.quantityField] = Number(inline[1] ?? inline[2]);
      rest = rest.replace(inline[0], ' ');
    }

    const name = rest
      .replace(/^\s*(?:a|an|the|some|of)\s+/i, '')
      .replace(/[^\p{L}\p{N}\s'&.-]/gu, ' ')
      .trim();
    if (name) {
      item[names.identifierField] = TextUtils.normalizeEntityName(name);
    }

    return item;
  }

  /**
   * Parse a brand-new item list from free text, including "replace X with Y" phrasing.
   */
  static parseItems(text: string, names: ItemFieldNames): DataRecord[] {
    const replaced = text.trim().match(REPLACE_PATTERN);
    const body = (replaced ? replaced[2] : text).replace(FILLER_PATTERN, ' ').trim();

    return body
      .split(ITEM_SEPARATOR)
      .map((segment) => segment.trim())
      .filter(Boolean)
      .map((segment) => DataExtractor.parseItem(segment, names))
      .filter((item) => TextUtils.asText(item[names.identifierField]) !== null);
  }

  async extractItems(text: string, names: ItemFieldNames): Promise<DataRecord[]> {
    if (this.completer) {
      try {
        const items = await this.extractItemsWithAI(text, names);
        if (items.length > 0) return items;
      } catch (error) {
        logger.warn('⚠️ [DataExtractor] AI item extraction failed, using heuristic parser', errorMeta(error));
      }
    }
    return DataExtractor.parseItems(text, names);
  }

  private async extractItemsWithAI(text: string, names: ItemFieldNames): Promise<DataRecord[]> {
    const completer = this.completer;
    if (!completer) return [];

    const prompt = [
      'Extract the list of items the user wants. Ignore items they asked to remove or replace.',
      `Message: "${TextUtils.cleanForLLM(text)}"`,
      `Each item is an object with "${names.identifierField}" (string) and optionally "${names.quantityField}" (number)` +
        ` and "${names.priceField ?? 'price'}" (number).`,
      'Answer with JSON only: {"items":[...]}',
    ].join('\n');

    const schema = z.object({ items: z.array(DataRecordSchema) });
    const { items } = await completeJson(completer, prompt, schema, { maxTokens: 400 });
    return items.filter((item) => TextUtils.asText(item[names.identifierField]) !== null);
  }

  // ==========================================================================
  // FIELDS
  // ==========================================================================

  /**
   * Pull values for the given fields out of a reply.
   * Labelled values ("price: 20") first, then unambiguous formats
   * (email, phone, a lone number), then the whole reply for a single text field.
   */
  static parseFields(text: string, fields: FieldSpec[]): DataRecord {
    const reply = text.trim();
    const extracted: DataRecord = {};
    if (!reply || fields.length === 0) return extracted;

    for (const field of fields) {
      const labels = [...new Set([field.label, field.name, field.name.replace(/_/g, ' ')])]
        .filter((label): label is string => Boolean(label))
        .map(escapeRegExp);
      const pattern =
        field.type === 'number'
          ? new RegExp(`(?:${labels.join('|')})\\s*(?:is|:|=)?\\s*\\$?\\s*(\\d[\\d,]*(?:\\.\\d+)?)`, 'i')
          : new RegExp(`(?:${labels.join('|')})\\s*(?:is|:|=)\\s*([^,;\\n]+)`, 'i');
      const match = reply.match(pattern);
      if (match) {
        const value = coerce(match[1], field.type);
        if (value !== null) extracted[field.name] = value;
      }
    }

    const remaining = fields.filter((field) => !(field.name in extracted));

    for (const field of remaining) {
      if (field.type === 'email' || field.type === 'phone') {
        const value = coerce(reply, field.type);
        if (value !== null) extracted[field.name] = value;
      }
    }

    const numeric = remaining.filter((field) => field.type === 'number');
    const numbers = TextUtils.extractNumbers(reply);
    if (numeric.length === 1 && numbers.length === 1 && Object.keys(extracted).length === 0) {
      extracted[numeric[0].name] = numbers[0];
    }

    const textual = remaining.filter((field) => field.type === 'text');
    if (remaining.length === 1 && textual.length === 1 && Object.keys(extracted).length === 0) {
      extracted[textual[0].name] = reply;
    }

    return extracted;
  }

  async extractFields(text: string, fields: FieldSpec[]): Promise<DataRecord> {
    const heuristic = DataExtractor.parseFields(text, fields);
    if (!this.completer || Object.keys(heuristic).length === fields.length) {
      return heuristic;
    }

    try {
      const prompt = [
        'Extract these fields from the user message when they are present:',
        fields.map((field) => `- ${field.name} (${field.type})`).join('\n'),
        `Message: "${TextUtils.cleanForLLM(text)}"`,
        'Answer with JSON only, an object with the found fields. Omit fields that are not in the message.',
      ].join('\n');
      const ai = await completeJson(this.completer, prompt, DataRecordSchema, { maxTokens: 300 });

      const known = new Map(fields.map((field) => [field.name, field]));
      const validated: DataRecord = {};
      for (const [key, value] of Object.entries(ai)) {
        const field = known.get(key);
        if (!field || value === null) continue;
        const coerced = typeof value === 'string' || typeof value === 'number' ? coerce(String(value), field.type) : null;
        if (coerced !== null) validated[key] = coerced;
      }
      // Labelled values typed by the user win over the model's reading
      return { ...validated, ...heuristic };
    } catch (error) {
      logger.warn('⚠️ [DataExtractor] AI field extraction failed, using heuristic parser', errorMeta(error));
      return heuristic;
    }
  }
}
