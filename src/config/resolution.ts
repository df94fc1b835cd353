/**
 * Resolution tuning constants and config construction
 */

import { ZodError } from 'zod';
import { ConfigurationError } from '../services/resolution/errors.js';
import { ResolutionConfigSchema, type ResolutionConfig, type ResolutionConfigInput } from '../types/schema.js';

export const RESOLUTION_THRESHOLDS = {
  /** Upper bound for the substring "wide net" query before scoring. */
  WIDE_NET_LIMIT: 20,

  /** Candidates scoring below this (0-100) are discarded. */
  MIN_CANDIDATE_SCORE: 30,

  /** Candidates presented to the user. */
  MAX_CANDIDATES: 5,

  SCORE_EXACT: 100,
  SCORE_CASE_INSENSITIVE: 95,
  SCORE_CONTAINMENT: 85,

  /** Words shorter than this are not used as extra wide-net terms. */
  MIN_TERM_LENGTH: 3,
} as const;

export const FUZZY_CHOICE_CONFIG = {
  /** Minimum similarity (0-1) for a free-text reply to select a candidate by label. */
  MIN_LABEL_SIMILARITY: 0.6,
  IGNORE_LOCATION: true,
  MIN_MATCH_CHARACTER_LENGTH: 2,
} as const;

export const CONTEXT_LIMITS = {
  /** Messages kept on the context between turns. */
  MAX_HISTORY_MESSAGES: 10,
  DEFAULT_SESSION_TTL_MS: 24 * 60 * 60 * 1000,
} as const;

/** Candidate keys for automatic creation defaults, in priority order. */
export const CREATION_FIELD_CANDIDATES = {
  IDENTIFIER: ['name', 'title', 'label', 'identifier'],
  WORKSPACE: ['workspace_id', 'workspace'],
  CREATOR: ['created_by', 'creator_id', 'user_id'],
} as const;

/**
 * Helper to convert a similarity threshold (higher is stricter) to a Fuse.js distance threshold
 */
export function toFuseThreshold(similarityThreshold: number): number {
  return 1 - similarityThreshold;
}

/**
 * Validate a per-field resolution config and apply defaults.
 */
export function defineResolutionConfig(input: ResolutionConfigInput): ResolutionConfig {
  try {
    return ResolutionConfigSchema.parse(input);
  } catch (error) {
    if (error instanceof ZodError) {
      const fields = error.issues.map((issue) => issue.path.join('.') || '(root)').join(', ');
      throw new ConfigurationError(`Invalid resolution config: ${fields}`);
    }
    throw error;
  }
}
