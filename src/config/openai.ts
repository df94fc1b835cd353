// src/config/openai.ts
import OpenAI from 'openai';
import { ConfigurationError } from '../services/resolution/errors.js';
import { ENVIRONMENT } from './environment.js';

export const DEFAULT_MODEL = ENVIRONMENT.OPENAI_MODEL;

let client: OpenAI | null = null;

/**
 * Lazily construct the OpenAI client so the engine runs without a key
 * when every AI path is disabled.
 */
export function getOpenAI(): OpenAI {
  if (!client) {
    if (!ENVIRONMENT.OPENAI_API_KEY) {
      throw new ConfigurationError('OPENAI_API_KEY is not configured');
    }
    client = new OpenAI({ apiKey: ENVIRONMENT.OPENAI_API_KEY });
  }
  return client;
}

export function isAIConfigured(): boolean {
  return Boolean(ENVIRONMENT.OPENAI_API_KEY);
}
