import { describe, expect, it } from 'vitest';
import type { RowQueryFn } from '../../src/config/database.js';
import { ProviderError } from '../../src/services/resolution/errors.js';
import { DuplicateEntryError, PgEntityStore } from '../../src/services/store/PgEntityStore.js';

interface RecordedQuery {
  text: string;
  params: unknown[];
}

function recordingStore(rows: unknown[] = []): { store: PgEntityStore; queries: RecordedQuery[] } {
  const queries: RecordedQuery[] = [];
  const run: RowQueryFn = async (text, params = []) => {
    queries.push({ text, params });
    return { rows };
  };
  return { store: new PgEntityStore('product', ['name', 'price'], run), queries };
}

function failingStore(error: unknown): PgEntityStore {
  const run: RowQueryFn = async () => {
    throw error;
  };
  return new PgEntityStore('product', ['name', 'price'], run);
}

describe('PgEntityStore', () => {
  describe('buildWhere', () => {
    const { store } = recordingStore();

    it('scopes by model and turns filters into equality or IS NULL', () => {
      expect(store.buildWhere({ id: 5, filters: { workspace_id: 7, archived_at: null } })).toEqual({
        where: 'model = $1 AND id = $2 AND fields->>$3 = $4 AND fields->>$5 IS NULL',
        params: ['product', 5, 'workspace_id', '7', 'archived_at'],
      });
    });

    it('compares case-insensitively in equals mode, once per field and term', () => {
      const { where, params } = store.buildWhere({
        match: { fields: ['name', 'sku'], terms: [' Desk Lamp '], mode: 'equals' },
      });

      expect(where).toBe('model = $1 AND (LOWER(fields->>$2) = LOWER($3) OR LOWER(fields->>$4) = LOWER($5))');
      expect(params).toEqual(['product', 'name', 'Desk Lamp', 'sku', 'Desk Lamp']);
    });

    it('escapes LIKE wildcards in contains mode', () => {
      expect(store.buildWhere({ match: { fields: ['name'], terms: ['50% off_sale'], mode: 'contains' } })).toEqual({
        where: 'model = $1 AND (fields->>$2 ILIKE $3)',
        params: ['product', 'name', '%50\\% off\\_sale%'],
      });
    });

    it('matches nothing when every term is blank', () => {
      expect(store.buildWhere({ match: { fields: ['name'], terms: ['  '], mode: 'contains' } })).toEqual({
        where: 'model = $1 AND FALSE',
        params: ['product'],
      });
    });
  });

  describe('queries', () => {
    it('reads rows in id order with the limit as the last parameter, keeping string ids', async () => {
      const { store, queries } = recordingStore([{ id: '9007199254740993', fields: { name: 'Desk Lamp' } }]);

      const records = await store.findMany({ match: { fields: ['name'], terms: ['lamp'], mode: 'contains' } }, 20);

      expect(records).toEqual([{ id: '9007199254740993', fields: { name: 'Desk Lamp' } }]);
      expect(queries).toEqual([
        {
          text: 'SELECT id, fields FROM entities WHERE model = $1 AND (fields->>$2 ILIKE $3) ORDER BY id ASC LIMIT $4',
          params: ['product', 'name', '%lamp%', 20],
        },
      ]);
    });

    it('returns null from findOne when nothing matches', async () => {
      const { store, queries } = recordingStore([]);

      expect(await store.findOne({ id: 3 })).toBeNull();
      expect(queries[0].params).toEqual(['product', 3, 1]);
    });

    it('inserts the fields as jsonb and returns the stored row', async () => {
      const { store, queries } = recordingStore([{ id: 3, fields: { name: 'Desk Lamp', price: 45 } }]);

      const record = await store.create({ name: 'Desk Lamp', price: 45 });

      expect(record).toEqual({ id: 3, fields: { name: 'Desk Lamp', price: 45 } });
      expect(queries).toEqual([
        {
          text: 'INSERT INTO entities (model, fields) VALUES ($1, $2::jsonb) RETURNING id, fields',
          params: ['product', '{"name":"Desk Lamp","price":45}'],
        },
      ]);
    });

    it('fails an insert that returns no row', async () => {
      const { store } = recordingStore([]);

      await expect(store.create({ name: 'Desk Lamp' })).rejects.toThrow('postgres: insert into product returned no row');
    });

    it('lists the writable fields it was given', async () => {
      const { store } = recordingStore();

      expect(await store.listWritableFields()).toEqual(['name', 'price']);
    });
  });

  describe('errors', () => {
    it('rejects rows that do not have the expected shape', async () => {
      const { store } = recordingStore([{ id: 1, fields: 'not an object' }]);

      await expect(store.findMany({}, 5)).rejects.toThrow(ProviderError);
    });

    it('maps unique violations to DuplicateEntryError', async () => {
      const store = failingStore(
        Object.assign(new Error('duplicate key value'), {
          code: '23505',
          constraint: 'entities_name_key',
          detail: 'Key (name)=(Desk Lamp) already exists.',
        })
      );

      const attempt = store.create({ name: 'Desk Lamp' });

      await expect(attempt).rejects.toThrow(DuplicateEntryError);
      await expect(attempt).rejects.toMatchObject({
        constraint: 'entities_name_key',
        detail: 'Key (name)=(Desk Lamp) already exists.',
      });
    });

    it('wraps other database errors as provider errors', async () => {
      const store = failingStore(new Error('connection refused'));

      await expect(store.findOne({ id: 1 })).rejects.toThrow('postgres: connection refused');
    });
  });
});
