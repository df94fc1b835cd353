import { describe, expect, it } from 'vitest';
import { StateMachine } from '../../src/orchestration/StateMachine.js';
import { ResolutionError } from '../../src/services/resolution/errors.js';

describe('StateMachine', () => {
  it('follows the duplicate-choice path to a terminal phase', () => {
    const machine = new StateMachine();
    machine.transition('duplicate_check');
    machine.transition('awaiting_choice');
    machine.transition('awaiting_choice');
    machine.transition('resolved');

    expect(machine.isTerminalState()).toBe(true);
    expect(machine.getStateHistory()).toEqual([
      'searching',
      'duplicate_check',
      'awaiting_choice',
      'awaiting_choice',
      'resolved',
    ]);
  });

  it('rejects transitions that are not allowed', () => {
    const machine = new StateMachine('searching', 'customer_id');

    expect(machine.canTransition('creating_auto')).toBe(false);
    expect(() => machine.transition('creating_auto')).toThrow(ResolutionError);
    expect(() => machine.transition('creating_auto')).toThrow('Invalid customer_id transition searching -> creating_auto');
    expect(machine.getCurrentPhase()).toBe('searching');
  });

  it('lets "new" on a duplicate prompt skip the creation confirmation', () => {
    const machine = new StateMachine('awaiting_choice');
    machine.transition('creating_new');

    expect(machine.getAllowedTransitions()).toEqual(['creating_via_subflow', 'creating_auto', 'failed']);
  });

  it('can start a creation subflow without a confirmation', () => {
    const machine = new StateMachine();
    machine.transition('duplicate_check');
    machine.transition('not_found');
    machine.transition('creating_via_subflow');

    expect(machine.getCurrentPhase()).toBe('creating_via_subflow');
    expect(machine.isTerminalState()).toBe(false);
  });

  it('ends on auto_resolved when the duplicate check finds an exact match', () => {
    const machine = new StateMachine();
    machine.transition('duplicate_check');
    machine.transition('auto_resolved');

    expect(machine.isTerminalState()).toBe(true);
    expect(machine.getAllowedTransitions()).toEqual([]);
  });

  it('resumes at the phase the stored field state implies', () => {
    expect(StateMachine.entryPhase({ kind: 'idle' })).toBe('searching');
    expect(StateMachine.entryPhase({ kind: 'done', entityId: 4 })).toBe('searching');
    expect(StateMachine.entryPhase({ kind: 'awaiting_create_confirm', identifier: 'Desk' })).toBe(
      'awaiting_create_confirmation'
    );
    expect(StateMachine.entryPhase({ kind: 'awaiting_duplicate_choice', identifier: 'Desk', candidates: [] })).toBe(
      'awaiting_choice'
    );
    expect(StateMachine.entryPhase({ kind: 'creating_via_subflow', identifier: 'Desk' })).toBe('creating_via_subflow');
  });
});
