import type { DataRecord, EntityQuery, EntityRecord, JsonValue } from '../../types/index.js';
import { ConfigurationError } from '../resolution/errors.js';

/**
 * Persistence capability for one entity type.
 */
export interface EntityStore {
  readonly model: string;
  findOne(query: EntityQuery): Promise<EntityRecord | null>;
  findMany(query: EntityQuery, limit: number): Promise<EntityRecord[]>;
  create(fields: DataRecord): Promise<EntityRecord>;
  listWritableFields(): Promise<string[]>;
}

/**
 * Stores keyed by entity-type identifier, registered at startup.
 */
export class EntityStoreRegistry {
  private readonly stores = new Map<string, EntityStore>();

  constructor(stores: EntityStore[] = []) {
    stores.forEach((store) => this.register(store));
  }

  register(store: EntityStore): this {
    this.stores.set(store.model, store);
    return this;
  }

  has(model: string): boolean {
    return this.stores.has(model);
  }

  get(model: string): EntityStore {
    const store = this.stores.get(model);
    if (!store) {
      throw new ConfigurationError(`No entity store registered for model "${model}"`);
    }
    return store;
  }

  models(): string[] {
    return [...this.stores.keys()];
  }
}

/**
 * In-process evaluation of an EntityQuery against a record
 */
export function matchesQuery(record: EntityRecord, query: EntityQuery): boolean {
  if (query.id !== undefined && String(record.id) !== String(query.id)) {
    return false;
  }

  for (const [key, expected] of Object.entries(query.filters ?? {})) {
    if (!sameValue(record.fields[key], expected)) return false;
  }

  const match = query.match;
  if (!match) return true;

  const terms = match.terms.map((term) => term.trim().toLowerCase()).filter(Boolean);
  if (terms.length === 0) return false;

  return match.fields.some((field) => {
    const value = record.fields[field];
    if (typeof value !== 'string' && typeof value !== 'number') return false;
    const text = String(value).trim().toLowerCase();
    return terms.some((term) => (match.mode === 'equals' ? text === term : text.includes(term)));
  });
}

function sameValue(actual: JsonValue | undefined, expected: JsonValue): boolean {
  if (actual === undefined) return expected === null;
  if (typeof actual === 'object' || typeof expected === 'object') {
    return actual === expected;
  }
  return String(actual) === String(expected);
}
