import { z } from 'zod';
import { query as defaultQuery, type RowQueryFn } from '../../config/database.js';
import type { DataRecord, EntityQuery, EntityRecord } from '../../types/index.js';
import { DataRecordSchema } from '../../types/schema.js';
import { logger } from '../../utils/logger.js';
import { ProviderError } from '../resolution/errors.js';
import type { EntityStore } from './EntityStore.js';

export class DuplicateEntryError extends Error {
  constructor(
    public readonly constraint?: string,
    public readonly detail?: string
  ) {
    super('Duplicate entry');
    this.name = 'DuplicateEntryError';
  }
}

const EntityRowSchema = z.object({
  // BIGSERIAL ids arrive as strings and stay strings
  id: z.union([z.string(), z.number()]),
  fields: DataRecordSchema,
});

interface PgErrorShape {
  code?: unknown;
  constraint?: unknown;
  detail?: unknown;
}

function pgErrorShape(error: unknown): PgErrorShape {
  if (typeof error !== 'object' || error === null) return {};
  return {
    code: 'code' in error ? error.code : undefined,
    constraint: 'constraint' in error ? error.constraint : undefined,
    detail: 'detail' in error ? error.detail : undefined,
  };
}

function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, (char) => `\\${char}`);
}

/**
 * Entity store backed by the shared `entities` table (see sql/schema.sql).
 * Writable fields come from the registry definition, not from introspection.
 */
export class PgEntityStore implements EntityStore {
  constructor(
    public readonly model: string,
    private readonly writableFields: string[],
    private readonly run: RowQueryFn = defaultQuery
  ) {}

  async findOne(query: EntityQuery): Promise<EntityRecord | null> {
    const rows = await this.findMany(query, 1);
    return rows.length > 0 ? rows[0] : null;
  }

  async findMany(query: EntityQuery, limit: number): Promise<EntityRecord[]> {
    const { where, params } = this.buildWhere(query);
    params.push(limit);
    const sql = `SELECT id, fields FROM entities WHERE ${where} ORDER BY id ASC LIMIT $${params.length}`;
    return this.executeQuery(sql, params);
  }

  async create(fields: DataRecord): Promise<EntityRecord> {
    const rows = await this.executeQuery(
      'INSERT INTO entities (model, fields) VALUES ($1, $2::jsonb) RETURNING id, fields',
      [this.model, JSON.stringify(fields)]
    );
    if (rows.length === 0) {
      throw new ProviderError('postgres', `insert into ${this.model} returned no row`);
    }
    return rows[0];
  }

  async listWritableFields(): Promise<string[]> {
    return [...this.writableFields];
  }

  /**
   * Translate an EntityQuery into a parameterised WHERE clause
   */
  buildWhere(query: EntityQuery): { where: string; params: unknown[] } {
    const params: unknown[] = [this.model];
    const clauses = ['model = $1'];
    const next = (value: unknown): string => {
      params.push(value);
      return `$${params.length}`;
    };

    if (query.id !== undefined) {
      clauses.push(`id = ${next(query.id)}`);
    }

    for (const [key, value] of Object.entries(query.filters ?? {})) {
      if (value === null) {
        clauses.push(`fields->>${next(key)} IS NULL`);
      } else {
        clauses.push(`fields->>${next(key)} = ${next(String(value))}`);
      }
    }

    if (query.match) {
      const terms = query.match.terms.map((term) => term.trim()).filter(Boolean);
      const alternatives: string[] = [];
      for (const field of query.match.fields) {
        for (const term of terms) {
          alternatives.push(
            query.match.mode === 'equals'
              ? `LOWER(fields->>${next(field)}) = LOWER(${next(term)})`
              : `fields->>${next(field)} ILIKE ${next(`%${escapeLike(term)}%`)}`
          );
        }
      }
      clauses.push(alternatives.length > 0 ? `(${alternatives.join(' OR ')})` : 'FALSE');
    }

    return { where: clauses.join(' AND '), params };
  }

  private async executeQuery(sql: string, params: unknown[]): Promise<EntityRecord[]> {
    try {
      const result = await this.run(sql, params);
      return result.rows.map((row) => EntityRowSchema.parse(row));
    } catch (error) {
      const pgError = pgErrorShape(error);
      if (pgError.code === '23505') {
        const constraint = typeof pgError.constraint === 'string' ? pgError.constraint : undefined;
        const detail = typeof pgError.detail === 'string' ? pgError.detail : undefined;
        logger.warn('Duplicate key violation', { model: this.model, constraint, detail });
        throw new DuplicateEntryError(constraint, detail);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ProviderError('postgres', message, { cause: error });
    }
  }
}
