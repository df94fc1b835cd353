import type pg from 'pg';
import { describe, expect, it } from 'vitest';
import type { QueryFn } from '../../src/config/database.js';
import { InMemorySessionStore, PgSessionStore } from '../../src/services/context/SessionStore.js';
import { WorkflowContext } from '../../src/services/context/WorkflowContext.js';
import { ProviderError } from '../../src/services/resolution/errors.js';

interface RecordedQuery {
  text: string;
  params: unknown[];
}

function emptyResult<T extends pg.QueryResultRow>(): pg.QueryResult<T> {
  return { command: 'SELECT', rowCount: 0, oid: 0, fields: [], rows: [] };
}

describe('InMemorySessionStore', () => {
  it('returns an independent copy on every load', async () => {
    const store = new InMemorySessionStore();
    const context = WorkflowContext.create('session-1');
    context.setCollected('customer_id', 1);
    await store.save('session-1', context);

    const first = await store.load('session-1');
    first?.setCollected('customer_id', 2);
    const second = await store.load('session-1');

    expect(second?.getCollected('customer_id')).toBe(1);
    expect(store.size).toBe(1);
  });

  it('expires sessions after their time to live', async () => {
    let now = 1_000;
    const store = new InMemorySessionStore(500, {}, () => now);
    await store.save('session-1', WorkflowContext.create('session-1'));

    now = 1_499;
    expect(await store.load('session-1')).not.toBeNull();

    now = 1_500;
    expect(await store.load('session-1')).toBeNull();
    expect(store.size).toBe(0);
  });

  it('deletes sessions', async () => {
    const store = new InMemorySessionStore();
    await store.save('session-1', WorkflowContext.create('session-1'));
    await store.delete('session-1');

    expect(await store.load('session-1')).toBeNull();
  });
});

describe('PgSessionStore', () => {
  it('upserts the serialized context with its expiry', async () => {
    const queries: RecordedQuery[] = [];
    const run: QueryFn = async <T extends pg.QueryResultRow>(text: string, params: unknown[] = []) => {
      queries.push({ text, params });
      return emptyResult<T>();
    };
    const store = new PgSessionStore(run, 60_000);
    const context = WorkflowContext.create('session-1');

    await store.save('session-1', context);

    expect(queries).toHaveLength(1);
    expect(queries[0].text).toContain('ON CONFLICT (session_id)');
    expect(queries[0].params).toEqual(['session-1', JSON.stringify(context.toJSON()), '60000']);
  });

  it('reads a missing or expired row as no session', async () => {
    const run: QueryFn = async <T extends pg.QueryResultRow>() => emptyResult<T>();

    expect(await new PgSessionStore(run).load('session-1')).toBeNull();
  });

  it('wraps database errors as provider errors', async () => {
    const run: QueryFn = async () => {
      throw new Error('connection refused');
    };
    const store = new PgSessionStore(run);

    await expect(store.load('session-1')).rejects.toThrow(ProviderError);
    await expect(store.delete('session-1')).rejects.toThrow('postgres: connection refused');
  });
});
