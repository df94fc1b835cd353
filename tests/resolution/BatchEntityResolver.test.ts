import { beforeEach, describe, expect, it } from 'vitest';
import { defineResolutionConfig } from '../../src/config/resolution.js';
import { WorkflowContext } from '../../src/services/context/WorkflowContext.js';
import { createTestRuntime, type TestRuntime } from '../helpers/fixtures.js';

const BATCH_PROMPT = [
  "The following products don't exist:",
  '',
  '• Laptop Stands (qty: 3)',
  '',
  'Would you like to create them? (yes/no)',
].join('\n');

describe('BatchEntityResolver', () => {
  let setup: TestRuntime;
  let context: WorkflowContext;

  const config = defineResolutionConfig({
    model: 'product',
    identifierField: 'name',
    includeFields: ['price'],
    friendlyName: 'product',
    aliasKeys: ['products'],
  });

  beforeEach(() => {
    setup = createTestRuntime({
      products: [
        { name: 'Wireless Mouse', price: 25 },
        { name: 'USB-C Hub', price: 40 },
      ],
    });
    context = WorkflowContext.create('session-batch');
  });

  it('validates items that all exist, letting user values win', async () => {
    context.setCollected('products', ['stale']);

    const result = await setup.runtime.engine.resolveBatch(
      'items',
      config,
      ['2 wireless mouse', { name: 'USB-C Hub', price: 35 }],
      context
    );

    const expected = [
      { id: 1, name: 'Wireless Mouse', price: 25, quantity: 2 },
      { id: 2, name: 'USB-C Hub', price: 35, quantity: 1 },
    ];
    expect(result).toEqual({
      status: 'success',
      message: '2 products found',
      data: { items: expected, created: 0 },
    });
    expect(context.getCollected('items')).toEqual(expected);
    expect(context.getCollected('products')).toBeUndefined();
    expect(context.batchState('items')).toEqual({ kind: 'done' });
  });

  it('asks once for all missing items, deduplicated by name', async () => {
    const result = await setup.runtime.engine.resolveBatch(
      'items',
      config,
      '2 laptop stands, 1 wireless mouse, laptop stands',
      context
    );

    expect(result).toEqual({
      status: 'needs_user_input',
      message: BATCH_PROMPT,
      metadata: {
        field: 'items',
        awaiting: 'batch_create_confirmation',
        error: 'not_found',
        missingItems: ['Laptop Stands'],
      },
    });

    const state = context.batchState('items');
    expect(state.kind).toBe('awaiting_create_confirm');
    if (state.kind === 'awaiting_create_confirm') {
      expect(state.validated).toHaveLength(1);
      expect(state.missing).toHaveLength(2);
    }
  });

  it('creates each distinct missing item once after confirmation', async () => {
    await setup.runtime.engine.resolveBatch('items', config, '2 laptop stands, 1 wireless mouse, laptop stands', context);
    context.addMessage('user', 'yes');

    const result = await setup.runtime.engine.resolveBatch('items', config, [], context);

    expect(result).toEqual({
      status: 'success',
      message: '3 products ready (1 created)',
      data: {
        items: [
          { id: 1, name: 'Wireless Mouse', price: 25, quantity: 1 },
          { id: 3, name: 'Laptop Stands', quantity: 2 },
          { id: 3, name: 'Laptop Stands', quantity: 1 },
        ],
        created: 1,
      },
    });
    expect(setup.products.all()[2]).toEqual({ id: 3, fields: { name: 'Laptop Stands' } });
  });

  it('creates the pending items when the confirmation mentions adding them', async () => {
    await setup.runtime.engine.resolveBatch('items', config, '2 laptop stands', context);
    context.addMessage('user', 'yes, add them');

    const result = await setup.runtime.engine.resolveBatch('items', config, [], context);

    expect(result).toEqual({
      status: 'success',
      message: '1 product ready (1 created)',
      data: { items: [{ id: 3, name: 'Laptop Stands', quantity: 2 }], created: 1 },
    });
  });

  it('keeps a decline that mentions changing nothing as a decline', async () => {
    await setup.runtime.engine.resolveBatch('items', config, '2 laptop stands', context);
    context.addMessage('user', 'no, do not change anything');

    const result = await setup.runtime.engine.resolveBatch('items', config, [], context);

    expect(result).toEqual({
      status: 'failure',
      error: 'Entity creation cancelled by user',
      metadata: { field: 'items', error: 'user_declined' },
    });
    expect(setup.products.all()).toHaveLength(2);
  });

  it('cancels the whole batch on decline', async () => {
    await setup.runtime.engine.resolveBatch('items', config, '2 laptop stands', context);
    context.addMessage('user', 'no thanks');

    const result = await setup.runtime.engine.resolveBatch('items', config, [], context);

    expect(result).toEqual({
      status: 'failure',
      error: 'Entity creation cancelled by user',
      metadata: { field: 'items', error: 'user_declined' },
    });
    expect(context.batchState('items')).toEqual({ kind: 'idle' });
    expect(setup.products.all()).toHaveLength(2);
  });

  it('replaces the pending list when the user modifies it', async () => {
    await setup.runtime.engine.resolveBatch('items', config, '2 laptop stands', context);
    context.addMessage('user', 'actually replace the laptop stands with 2 wireless mouse');

    const result = await setup.runtime.engine.resolveBatch('items', config, [], context);

    expect(result).toEqual({
      status: 'success',
      message: '1 product found',
      data: { items: [{ id: 1, name: 'Wireless Mouse', price: 25, quantity: 2 }], created: 0 },
    });
  });

  it('creates missing items directly when not interactive, keeping item fields', async () => {
    const direct = defineResolutionConfig({ ...config, interactive: false });

    const result = await setup.runtime.engine.resolveBatch(
      'items',
      direct,
      [{ name: 'Desk Lamp', price: 30, quantity: 2 }],
      context
    );

    expect(result).toEqual({
      status: 'success',
      message: '1 product ready (1 created)',
      data: { items: [{ id: 3, name: 'Desk Lamp', price: 30, quantity: 2 }], created: 1 },
    });
  });
});
