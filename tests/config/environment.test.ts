import { describe, expect, it } from 'vitest';
import { loadEnvironment } from '../../src/config/environment.js';
import { defineResolutionConfig } from '../../src/config/resolution.js';
import { ConfigurationError } from '../../src/services/resolution/errors.js';

describe('loadEnvironment', () => {
  it('applies defaults when nothing is set', () => {
    const env = loadEnvironment({});

    expect(env.NODE_ENV).toBe('development');
    expect(env.OPENAI_MODEL).toBe('gpt-4o-mini');
    expect(env.AI_INTENT_ENABLED).toBe(false);
    expect(env.MAX_WORKFLOW_DEPTH).toBe(5);
    expect(env.STORE_TIMEOUT_MS).toBe(5000);
  });

  it('parses flags and numbers, treating blank values as unset', () => {
    const env = loadEnvironment({ AI_RERANK_ENABLED: 'yes', MAX_STEPS_PER_TURN: '40', OPENAI_API_KEY: '  ' });

    expect(env.AI_RERANK_ENABLED).toBe(true);
    expect(env.MAX_STEPS_PER_TURN).toBe(40);
    expect(env.OPENAI_API_KEY).toBeUndefined();
  });

  it('names every invalid key', () => {
    expect(() => loadEnvironment({ MAX_WORKFLOW_DEPTH: '0', LOG_LEVEL: 'loud' })).toThrow(
      'Invalid environment configuration: LOG_LEVEL, MAX_WORKFLOW_DEPTH'
    );
  });
});

describe('defineResolutionConfig', () => {
  it('fills defaults', () => {
    const config = defineResolutionConfig({ model: 'product' });

    expect(config.searchFields).toEqual(['name']);
    expect(config.displayFields).toEqual([]);
  });

  it('reports invalid configs as configuration errors', () => {
    expect(() => defineResolutionConfig({ model: '' })).toThrow(ConfigurationError);
  });
});
