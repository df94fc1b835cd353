import { z } from 'zod';
import { FuzzyMatcher } from '../../utils/fuzzy.js';
import { errorMeta, logger } from '../../utils/logger.js';
import { TextUtils } from '../../utils/text.js';
import { completeJson, type TextCompleter } from '../ai/TextCompleter.js';
import { ProviderError } from './errors.js';

// ============================================================================
// TYPES
// ============================================================================

export type ConfirmationIntent =
  | { kind: 'confirm' }
  | { kind: 'decline' }
  | { kind: 'modify'; instruction: string }
  | { kind: 'provide_data' }
  | { kind: 'unclear' };

export type DuplicateChoice =
  | { kind: 'use'; index: number }
  | { kind: 'create' }
  | { kind: 'unclear' };

/**
 * Classifies a free-text reply into one of a fixed set of intents.
 * `options` are the labels of the candidates the user was shown, in order.
 */
export interface IntentInterpreter {
  interpretConfirmation(text: string): Promise<ConfirmationIntent>;
  interpretDuplicateChoice(text: string, options: readonly string[]): Promise<DuplicateChoice>;
}

// ============================================================================
// VOCABULARY
// ============================================================================

const CONFIRM_PHRASES = [
  'yes', 'y', 'ok', 'okay', 'confirm', 'sure', 'yep', 'yeah', 'yup', 'proceed',
  'go ahead', 'create', 'create it', 'do it', 'make it', 'please do', 'כן', 'אישור', 'בטוח',
];

const DECLINE_PHRASES = [
  'no', 'n', 'nope', 'nah', 'cancel', 'stop', 'abort', 'nevermind', 'never mind', "don't", 'dont',
  'reject', 'לא', 'ביטול',
];

const MODIFY_WORDS = new Set(['replace', 'change', 'instead', 'swap', 'modify', 'update', 'remove', 'add', 'rather']);
const CHANGE_PATTERN = /\b(?:replace|swap|change)\s+.+?\s+(?:with|to|for)\s+\S/i;
// Words after a modification verb that do not name anything to change
const NON_OBJECTS = new Set([
  'it', 'them', 'that', 'this', 'those', 'these', 'anything', 'everything', 'nothing', 'all',
  'one', 'ones', 'not', 'please', 'now', 'too', 'more', 'there', 'here',
]);
const FILLERS = new Set(['the', 'a', 'an', 'my', 'of', 'to', 'some']);

const USE_REPLIES = new Set(['use', 'yes', 'y', 'ok', 'sure', 'yeah', 'כן']);
const CREATE_WORDS = new Set(['new', 'create', 'different', 'another']);
const NONE_WORDS = new Set(['none', 'neither', 'no', 'nope']);

const ORDINALS: Record<string, number> = {
  first: 0, '1st': 0,
  second: 1, '2nd': 1,
  third: 2, '3rd': 2,
  fourth: 3, '4th': 3,
  fifth: 4, '5th': 4,
};

function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}']+/gu) ?? [];
}

/**
 * Index of the first token where `phrase` starts, or -1
 */
function phraseIndex(tokens: string[], phrase: string): number {
  const words = phrase.split(' ');
  for (let i = 0; i + words.length <= tokens.length; i++) {
    if (words.every((word, offset) => tokens[i + offset] === word)) return i;
  }
  return -1;
}

/**
 * A reply asks for a change when it has a "replace X with Y" shape or a
 * modification verb followed by a concrete object ("add a desk lamp", not "add them").
 */
function requestsChange(text: string, tokens: string[]): boolean {
  if (CHANGE_PATTERN.test(text)) return true;

  return tokens.some((token, index) => {
    if (!MODIFY_WORDS.has(token)) return false;
    const object = tokens.slice(index + 1).find((next) => !FILLERS.has(next));
    return object !== undefined && !NON_OBJECTS.has(object);
  });
}

function firstPhraseIndex(tokens: string[], phrases: readonly string[]): number {
  const positions = phrases.map((phrase) => phraseIndex(tokens, phrase)).filter((index) => index >= 0);
  return positions.length > 0 ? Math.min(...positions) : -1;
}

// ============================================================================
// HEURISTIC
// ============================================================================

/**
 * Keyword interpreter. Deterministic and needs no provider.
 */
export class HeuristicIntentInterpreter implements IntentInterpreter {
  async interpretConfirmation(text: string): Promise<ConfirmationIntent> {
    return HeuristicIntentInterpreter.classifyConfirmation(text);
  }

  async interpretDuplicateChoice(text: string, options: readonly string[]): Promise<DuplicateChoice> {
    return HeuristicIntentInterpreter.classifyDuplicateChoice(text, options);
  }

  static classifyConfirmation(text: string): ConfirmationIntent {
    const trimmed = text.trim();
    const tokens = tokenize(trimmed);
    if (tokens.length === 0) return { kind: 'unclear' };

    if (requestsChange(trimmed, tokens)) {
      return { kind: 'modify', instruction: trimmed };
    }

    const confirmAt = firstPhraseIndex(tokens, CONFIRM_PHRASES);
    const declineAt = firstPhraseIndex(tokens, DECLINE_PHRASES);

    if (confirmAt >= 0 && (declineAt < 0 || confirmAt < declineAt)) return { kind: 'confirm' };
    if (declineAt >= 0) return { kind: 'decline' };

    if (/[\p{L}_]+\s*[:=]\s*\S/u.test(trimmed) || TextUtils.extractEmails(trimmed).length > 0) {
      return { kind: 'provide_data' };
    }

    return { kind: 'unclear' };
  }

  static classifyDuplicateChoice(text: string, options: readonly string[]): DuplicateChoice {
    const normalized = TextUtils.normalize(text).replace(/[.!?]+$/, '');
    const count = options.length;
    if (!normalized || count === 0) return { kind: 'unclear' };

    if (USE_REPLIES.has(normalized)) return { kind: 'use', index: 0 };

    const tokens = tokenize(normalized);
    if (tokens.some((token) => CREATE_WORDS.has(token))) return { kind: 'create' };

    const numbered = normalized.match(/^(?:#|option\s+|number\s+|use\s+)?(\d+)$/);
    if (numbered) {
      const choice = Number(numbered[1]);
      return choice >= 1 && choice <= count ? { kind: 'use', index: choice - 1 } : { kind: 'unclear' };
    }

    for (const token of tokens) {
      const ordinal = ORDINALS[token];
      if (ordinal !== undefined && ordinal < count) return { kind: 'use', index: ordinal };
    }

    const exact = options.findIndex((label) => TextUtils.normalize(label) === normalized);
    if (exact >= 0) return { kind: 'use', index: exact };

    const fuzzy = FuzzyMatcher.search(
      normalized,
      options.map((label) => ({ label })),
      ['label']
    );
    if (fuzzy.length > 0) return { kind: 'use', index: fuzzy[0].refIndex };

    if (tokens.some((token) => NONE_WORDS.has(token))) return { kind: 'create' };

    return { kind: 'unclear' };
  }
}

// ============================================================================
// AI
// ============================================================================

const ConfirmationResponseSchema = z.object({
  intent: z.enum(['confirm', 'decline', 'modify', 'provide_data', 'unclear']),
});

const DuplicateChoiceResponseSchema = z.object({
  choice: z.enum(['use', 'create', 'unclear']),
  index: z.number().int().optional(),
});

/**
 * Completion-backed interpreter. Answers outside the fixed label set fail validation.
 */
export class AIIntentInterpreter implements IntentInterpreter {
  constructor(private readonly completer: TextCompleter) {}

  async interpretConfirmation(text: string): Promise<ConfirmationIntent> {
    const prompt = [
      'The user was asked to confirm an action. Classify their reply.',
      `Reply: "${TextUtils.cleanForLLM(text)}"`,
      'Labels: confirm, decline, modify (they want something changed), provide_data (they gave field values), unclear.',
      'Answer with JSON only: {"intent":"<label>"}',
    ].join('\n');

    const { intent } = await completeJson(this.completer, prompt, ConfirmationResponseSchema, { maxTokens: 50 });
    return intent === 'modify' ? { kind: 'modify', instruction: text.trim() } : { kind: intent };
  }

  async interpretDuplicateChoice(text: string, options: readonly string[]): Promise<DuplicateChoice> {
    const listing = options.map((label, i) => `${i + 1}. ${label}`).join('\n');
    const prompt = [
      'The user was shown these existing records and asked to pick one or create a new one:',
      listing,
      `Reply: "${TextUtils.cleanForLLM(text)}"`,
      'Answer with JSON only: {"choice":"use","index":<1-based number>} or {"choice":"create"} or {"choice":"unclear"}',
    ].join('\n');

    const response = await completeJson(this.completer, prompt, DuplicateChoiceResponseSchema, { maxTokens: 50 });
    if (response.choice !== 'use') {
      return { kind: response.choice };
    }
    if (response.index === undefined || response.index < 1 || response.index > options.length) {
      throw new ProviderError('completion', `choice index out of range: ${String(response.index)}`);
    }
    return { kind: 'use', index: response.index - 1 };
  }
}

// ============================================================================
// COMPOSITION
// ============================================================================

/**
 * Heuristic first. Only an `unclear` heuristic verdict is escalated to the
 * secondary interpreter, and any failure there resolves to `unclear`.
 */
export class FallbackIntentInterpreter implements IntentInterpreter {
  constructor(
    private readonly primary: IntentInterpreter = new HeuristicIntentInterpreter(),
    private readonly secondary?: IntentInterpreter
  ) {}

  async interpretConfirmation(text: string): Promise<ConfirmationIntent> {
    const verdict = await this.primary.interpretConfirmation(text);
    if (verdict.kind !== 'unclear' || !this.secondary) return verdict;

    try {
      return await this.secondary.interpretConfirmation(text);
    } catch (error) {
      logger.warn('⚠️ [IntentInterpreter] AI confirmation fallback failed', errorMeta(error));
      return verdict;
    }
  }

  async interpretDuplicateChoice(text: string, options: readonly string[]): Promise<DuplicateChoice> {
    const verdict = await this.primary.interpretDuplicateChoice(text, options);
    if (verdict.kind !== 'unclear' || !this.secondary) return verdict;

    try {
      return await this.secondary.interpretDuplicateChoice(text, options);
    } catch (error) {
      logger.warn('⚠️ [IntentInterpreter] AI duplicate-choice fallback failed', errorMeta(error));
      return verdict;
    }
  }
}
