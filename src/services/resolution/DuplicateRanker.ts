import { z } from 'zod';
import { RESOLUTION_THRESHOLDS } from '../../config/resolution.js';
import type { Candidate, EntityRecord, ResolutionConfig } from '../../types/index.js';
import { FuzzyMatcher } from '../../utils/fuzzy.js';
import { errorMeta, logger } from '../../utils/logger.js';
import { TextUtils } from '../../utils/text.js';
import { completeJson, type TextCompleter } from '../ai/TextCompleter.js';
import type { EntityStore } from '../store/EntityStore.js';
import { ProviderError } from './errors.js';

/**
 * Optional replacement for the heuristic ordering. Whatever it returns is
 * clamped, filtered, sorted and truncated by the ranker.
 */
export interface CandidateReranker {
  rerank(identifier: string, candidates: Candidate[], config: ResolutionConfig): Promise<Candidate[]>;
}

export class DuplicateRanker {
  constructor(private readonly reranker?: CandidateReranker) {}

  static calculateSimilarity(search: string, target: string): number {
    return FuzzyMatcher.calculateSimilarity(search, target);
  }

  /**
   * Terms for the substring query: the whole identifier plus its significant words
   */
  static wideNetTerms(identifier: string): string[] {
    const whole = identifier.trim();
    const words = TextUtils.normalize(whole)
      .split(' ')
      .filter((word) => word.length >= RESOLUTION_THRESHOLDS.MIN_TERM_LENGTH);
    return [...new Set([whole, ...words])].filter(Boolean);
  }

  /**
   * Best score across the configured search fields, or null when no field holds text
   */
  scoreRecord(identifier: string, record: EntityRecord, searchFields: string[]): Candidate | null {
    const search = identifier.trim().toLowerCase();
    let best: Candidate | null = null;

    for (const field of searchFields) {
      const value = TextUtils.asText(record.fields[field]);
      if (value === null) continue;

      const score = DuplicateRanker.calculateSimilarity(search, value.toLowerCase());
      if (!best || score > best.similarityScore) {
        best = { id: record.id, fields: record.fields, similarityScore: score, matchedField: field };
      }
    }

    return best;
  }

  /**
   * Heuristic ranking: score, drop below threshold, sort descending, keep the top candidates
   */
  rank(identifier: string, records: EntityRecord[], searchFields: string[]): Candidate[] {
    return DuplicateRanker.enforceContract(this.scoreAll(identifier, records, searchFields));
  }

  private scoreAll(identifier: string, records: EntityRecord[], searchFields: string[]): Candidate[] {
    return records
      .map((record) => this.scoreRecord(identifier, record, searchFields))
      .filter((candidate): candidate is Candidate => candidate !== null);
  }

  /**
   * Two-phase duplicate search: a bounded substring query, then scoring.
   */
  async findSimilar(store: EntityStore, identifier: string, config: ResolutionConfig): Promise<Candidate[]> {
    const records = await store.findMany(
      {
        filters: config.filters,
        match: { fields: config.searchFields, terms: DuplicateRanker.wideNetTerms(identifier), mode: 'contains' },
      },
      RESOLUTION_THRESHOLDS.WIDE_NET_LIMIT
    );

    logger.debug('🔍 [DuplicateRanker] Wide net results', { model: config.model, identifier, count: records.length });

    const scored = this.scoreAll(identifier, records, config.searchFields);
    const heuristic = DuplicateRanker.enforceContract(scored);
    if (!this.reranker || records.length === 0) {
      return heuristic;
    }

    try {
      const reranked = await this.reranker.rerank(identifier, scored, config);
      return DuplicateRanker.enforceContract(reranked);
    } catch (error) {
      logger.warn('⚠️ [DuplicateRanker] Re-ranking failed, using heuristic order', {
        model: config.model,
        ...errorMeta(error),
      });
      return heuristic;
    }
  }

  /**
   * Clamp scores to 0..100, drop those under the threshold, sort descending (stable) and truncate.
   */
  static enforceContract(candidates: Candidate[]): Candidate[] {
    return candidates
      .map((candidate) => ({
        ...candidate,
        similarityScore: Math.max(0, Math.min(100, Math.trunc(candidate.similarityScore))),
      }))
      .filter((candidate) => candidate.similarityScore >= RESOLUTION_THRESHOLDS.MIN_CANDIDATE_SCORE)
      .sort((a, b) => b.similarityScore - a.similarityScore)
      .slice(0, RESOLUTION_THRESHOLDS.MAX_CANDIDATES);
  }
}

const RerankResponseSchema = z.object({
  rankings: z.array(
    z.object({
      id: z.union([z.string(), z.number()]),
      score: z.number(),
    })
  ),
});

/**
 * Re-ranks candidates with a completion model. Unknown ids are ignored; an answer
 * naming none of the candidates is rejected so the heuristic order stands.
 */
export class AIDuplicateReranker implements CandidateReranker {
  constructor(private readonly completer: TextCompleter) {}

  async rerank(identifier: string, candidates: Candidate[], config: ResolutionConfig): Promise<Candidate[]> {
    const labelField = config.searchFields[0];
    const listing = candidates
      .map((candidate) => `- id=${candidate.id}: ${TextUtils.asText(candidate.fields[labelField]) ?? '(no label)'}`)
      .join('\n');

    const prompt = [
      `The user referred to a ${config.model} as "${TextUtils.cleanForLLM(identifier)}".`,
      'Score how likely each existing record below is the same thing, from 0 to 100.',
      listing,
      'Answer with JSON only: {"rankings":[{"id":<id>,"score":<0-100>}]}',
    ].join('\n\n');

    const response = await completeJson(this.completer, prompt, RerankResponseSchema, { maxTokens: 300 });

    const byId = new Map(candidates.map((candidate) => [String(candidate.id), candidate]));
    const reranked: Candidate[] = [];
    for (const ranking of response.rankings) {
      const candidate = byId.get(String(ranking.id));
      if (candidate) {
        reranked.push({ ...candidate, similarityScore: ranking.score });
        byId.delete(String(ranking.id));
      }
    }

    if (reranked.length === 0) {
      throw new ProviderError('completion', 're-ranking named no known candidate');
    }
    return reranked;
  }
}
