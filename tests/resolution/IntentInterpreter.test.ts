import { describe, expect, it } from 'vitest';
import {
  AIIntentInterpreter,
  FallbackIntentInterpreter,
  HeuristicIntentInterpreter,
} from '../../src/services/resolution/IntentInterpreter.js';
import { ScriptedCompleter } from '../helpers/fixtures.js';

const LABELS = ['MacBook Pro M4', 'Macbook'];

describe('HeuristicIntentInterpreter', () => {
  describe('classifyConfirmation', () => {
    it.each([
      ['yes', 'confirm'],
      ['Yes please', 'confirm'],
      ['go ahead', 'confirm'],
      ['כן', 'confirm'],
      ['no', 'decline'],
      ['never mind', 'decline'],
      ['hmm', 'unclear'],
      ['', 'unclear'],
    ])('reads %j as %s', (reply, kind) => {
      expect(HeuristicIntentInterpreter.classifyConfirmation(reply).kind).toBe(kind);
    });

    it('lets whichever answer comes first win', () => {
      expect(HeuristicIntentInterpreter.classifyConfirmation('no, yes').kind).toBe('decline');
      expect(HeuristicIntentInterpreter.classifyConfirmation('ok but cancel the rest').kind).toBe('confirm');
    });

    it('treats change requests as modifications carrying the reply', () => {
      expect(HeuristicIntentInterpreter.classifyConfirmation('  replace the mouse with a hub ')).toEqual({
        kind: 'modify',
        instruction: 'replace the mouse with a hub',
      });
    });

    it.each([
      ['yes, add them', 'confirm'],
      ['sure, go ahead and add them', 'confirm'],
      ['no, do not change anything', 'decline'],
    ])('does not read %j as a modification', (reply, kind) => {
      expect(HeuristicIntentInterpreter.classifyConfirmation(reply).kind).toBe(kind);
    });

    it('needs a concrete object after a modification verb', () => {
      expect(HeuristicIntentInterpreter.classifyConfirmation('add a desk lamp too')).toEqual({
        kind: 'modify',
        instruction: 'add a desk lamp too',
      });
      expect(HeuristicIntentInterpreter.classifyConfirmation('yes, change it to 3 lamps').kind).toBe('modify');
    });

    it('recognises replies that supply field values', () => {
      expect(HeuristicIntentInterpreter.classifyConfirmation('price: 20').kind).toBe('provide_data');
      expect(HeuristicIntentInterpreter.classifyConfirmation('ops@globex.test').kind).toBe('provide_data');
    });
  });

  describe('classifyDuplicateChoice', () => {
    it('accepts numbers, ordinals and labels', () => {
      expect(HeuristicIntentInterpreter.classifyDuplicateChoice('2', LABELS)).toEqual({ kind: 'use', index: 1 });
      expect(HeuristicIntentInterpreter.classifyDuplicateChoice('#1', LABELS)).toEqual({ kind: 'use', index: 0 });
      expect(HeuristicIntentInterpreter.classifyDuplicateChoice('the second one', LABELS)).toEqual({
        kind: 'use',
        index: 1,
      });
      expect(HeuristicIntentInterpreter.classifyDuplicateChoice('macbook', LABELS)).toEqual({ kind: 'use', index: 1 });
    });

    it('uses the first candidate on a bare yes', () => {
      expect(HeuristicIntentInterpreter.classifyDuplicateChoice('Yes.', LABELS)).toEqual({ kind: 'use', index: 0 });
    });

    it('creates on "new" or when none fit', () => {
      expect(HeuristicIntentInterpreter.classifyDuplicateChoice('create a new one', LABELS)).toEqual({ kind: 'create' });
      expect(HeuristicIntentInterpreter.classifyDuplicateChoice('neither', LABELS)).toEqual({ kind: 'create' });
    });

    it('rejects out-of-range numbers', () => {
      expect(HeuristicIntentInterpreter.classifyDuplicateChoice('3', LABELS)).toEqual({ kind: 'unclear' });
      expect(HeuristicIntentInterpreter.classifyDuplicateChoice('2', [])).toEqual({ kind: 'unclear' });
    });
  });
});

describe('FallbackIntentInterpreter', () => {
  it('never asks the model when the heuristic is sure', async () => {
    const completer = new ScriptedCompleter([]);
    const interpreter = new FallbackIntentInterpreter(new HeuristicIntentInterpreter(), new AIIntentInterpreter(completer));

    expect(await interpreter.interpretConfirmation('yes')).toEqual({ kind: 'confirm' });
    expect(completer.prompts).toHaveLength(0);
  });

  it('escalates unclear confirmations to the model', async () => {
    const completer = new ScriptedCompleter(['```json\n{"intent":"confirm"}\n```']);
    const interpreter = new FallbackIntentInterpreter(new HeuristicIntentInterpreter(), new AIIntentInterpreter(completer));

    expect(await interpreter.interpretConfirmation('sounds good to me')).toEqual({ kind: 'confirm' });
    expect(completer.prompts[0]).toContain('Reply: "sounds good to me"');
  });

  it('stays unclear when the model answers outside the label set', async () => {
    const completer = new ScriptedCompleter(['{"intent":"maybe"}']);
    const interpreter = new FallbackIntentInterpreter(new HeuristicIntentInterpreter(), new AIIntentInterpreter(completer));

    expect(await interpreter.interpretConfirmation('hmm')).toEqual({ kind: 'unclear' });
  });

  it('maps a model duplicate choice to a zero-based index', async () => {
    const completer = new ScriptedCompleter(['{"choice":"use","index":2}']);
    const interpreter = new FallbackIntentInterpreter(new HeuristicIntentInterpreter(), new AIIntentInterpreter(completer));

    expect(await interpreter.interpretDuplicateChoice('the cheaper one', LABELS)).toEqual({ kind: 'use', index: 1 });
  });

  it('stays unclear when the model picks an index that was not offered', async () => {
    const completer = new ScriptedCompleter(['{"choice":"use","index":5}']);
    const interpreter = new FallbackIntentInterpreter(new HeuristicIntentInterpreter(), new AIIntentInterpreter(completer));

    expect(await interpreter.interpretDuplicateChoice('the cheaper one', LABELS)).toEqual({ kind: 'unclear' });
  });

  it('stays unclear when the provider fails', async () => {
    const completer = new ScriptedCompleter([new Error('rate limited')]);
    const interpreter = new FallbackIntentInterpreter(new HeuristicIntentInterpreter(), new AIIntentInterpreter(completer));

    expect(await interpreter.interpretDuplicateChoice('the cheaper one', LABELS)).toEqual({ kind: 'unclear' });
  });
});
