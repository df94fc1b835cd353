import type { DataRecord, EntityQuery, EntityRecord } from '../../types/index.js';
import type { EntityStore } from './EntityStore.js';
import { matchesQuery } from './EntityStore.js';

export interface InMemoryEntityStoreOptions {
  writableFields: string[];
  records?: Array<{ id?: number; fields: DataRecord }>;
}

/**
 * Entity store held in process memory. Used for tests and local runs.
 */
export class InMemoryEntityStore implements EntityStore {
  private readonly records: EntityRecord[] = [];
  private readonly writableFields: string[];
  private nextId = 1;

  constructor(
    public readonly model: string,
    options: InMemoryEntityStoreOptions
  ) {
    this.writableFields = [...options.writableFields];
    for (const seed of options.records ?? []) {
      const id = seed.id ?? this.nextId;
      this.nextId = Math.max(this.nextId, id + 1);
      this.records.push({ id, fields: structuredClone(seed.fields) });
    }
  }

  async findOne(query: EntityQuery): Promise<EntityRecord | null> {
    const found = this.records.find((record) => matchesQuery(record, query));
    return found ? structuredClone(found) : null;
  }

  async findMany(query: EntityQuery, limit: number): Promise<EntityRecord[]> {
    return this.records
      .filter((record) => matchesQuery(record, query))
      .slice(0, limit)
      .map((record) => structuredClone(record));
  }

  async create(fields: DataRecord): Promise<EntityRecord> {
    const record: EntityRecord = { id: this.nextId++, fields: structuredClone(fields) };
    this.records.push(record);
    return structuredClone(record);
  }

  async listWritableFields(): Promise<string[]> {
    return [...this.writableFields];
  }

  /** Every stored record, in insertion order */
  all(): EntityRecord[] {
    return this.records.map((record) => structuredClone(record));
  }
}
