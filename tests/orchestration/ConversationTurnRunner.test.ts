import { beforeEach, describe, expect, it } from 'vitest';
import { ConversationTurnRunner } from '../../src/orchestration/ConversationTurnRunner.js';
import { SessionLock } from '../../src/services/concurrency/SessionLock.js';
import { InMemorySessionStore } from '../../src/services/context/SessionStore.js';
import { ActionResults } from '../../src/services/resolution/results.js';
import { createTestRuntime, type TestRuntime } from '../helpers/fixtures.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let release: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    release = () => resolve();
  });
  return { promise, resolve: () => release() };
}

describe('ConversationTurnRunner', () => {
  let setup: TestRuntime;
  let sessions: InMemorySessionStore;
  let lock: SessionLock;
  let turns: ConversationTurnRunner;

  beforeEach(() => {
    setup = createTestRuntime({ customers: [{ name: 'Acme Corp', email: 'billing@acme.test' }] });
    sessions = new InMemorySessionStore();
    lock = new SessionLock();
    turns = new ConversationTurnRunner(sessions, setup.runtime.runner, lock);
  });

  it('starts a workflow and persists the context between turns', async () => {
    const outcome = await turns.handleTurn('session-a', 'Acme Corp', { workflowId: 'invoice' });

    expect(outcome).toEqual({
      status: 'accepted',
      result: {
        status: 'needs_user_input',
        message: 'Which products should the invoice include?',
        metadata: { field: 'items', awaiting: 'field_input' },
      },
    });

    const saved = await sessions.load('session-a');
    expect(saved?.currentWorkflow).toBe('invoice');
    expect(saved?.currentStep).toBe('line_items');
    expect(saved?.getCollected('customer_id')).toBe(1);
  });

  it('does not start anything without a workflow', async () => {
    const outcome = await turns.handleTurn('session-b', 'hello');

    expect(outcome).toEqual({ status: 'accepted', result: { status: 'failure', error: 'No active workflow' } });
    expect(sessions.size).toBe(0);
  });

  it('rejects a second turn while the session is busy', async () => {
    const gate = deferred();
    setup.runtime.workflows.register({
      id: 'slow',
      steps: [
        {
          name: 'wait',
          execute: async () => {
            await gate.promise;
            return ActionResults.success('done');
          },
        },
      ],
      getEntityFields: () => [],
    });

    const first = turns.handleTurn('session-c', 'go', { workflowId: 'slow' });
    expect(lock.isBusy('session-c')).toBe(true);

    const second = await turns.handleTurn('session-c', 'again');
    expect(second).toEqual({ status: 'rejected', reason: 'busy' });

    const other = await turns.handleTurn('session-d', 'hello');
    expect(other.status).toBe('accepted');

    gate.resolve();
    expect(await first).toEqual({ status: 'accepted', result: { status: 'success', message: 'done', data: {} } });
    expect(lock.isBusy('session-c')).toBe(false);
  });

  it('does not save a turn that throws', async () => {
    setup.runtime.workflows.register({
      id: 'broken',
      steps: [
        {
          name: 'explode',
          execute: async () => {
            throw new Error('boom');
          },
        },
      ],
      getEntityFields: () => [],
    });

    const outcome = await turns.handleTurn('session-e', 'go', { workflowId: 'broken' });

    expect(outcome).toEqual({
      status: 'accepted',
      result: { status: 'failure', error: 'boom', metadata: { error: 'unexpected' } },
    });
    expect(await sessions.load('session-e')).toBeNull();
    expect(lock.isBusy('session-e')).toBe(false);
  });
});
