import type OpenAI from 'openai';
import type { z } from 'zod';
import { DEFAULT_MODEL, getOpenAI } from '../../config/openai.js';
import { ENVIRONMENT } from '../../config/environment.js';
import { logger } from '../../utils/logger.js';
import { withTimeout } from '../../utils/timeout.js';
import { ProviderError } from '../resolution/errors.js';

export interface CompletionOptions {
  maxTokens?: number;
  temperature?: number;
  systemPrompt?: string;
}

/**
 * Provider-agnostic text completion. Implementations reject with ProviderError.
 */
export interface TextCompleter {
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

/**
 * Models that take max_completion_tokens instead of max_tokens
 */
function requiresMaxCompletionTokens(model: string): boolean {
  return /^(o\d|gpt-5)/.test(model);
}

export class OpenAITextCompleter implements TextCompleter {
  constructor(
    private readonly clientFactory: () => OpenAI = getOpenAI,
    private readonly model: string = DEFAULT_MODEL,
    private readonly timeoutMs: number = ENVIRONMENT.AI_TIMEOUT_MS
  ) {}

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const { maxTokens = 300, temperature = 0, systemPrompt } = options;
    const started = Date.now();

    const messages: OpenAI.Chat.Completions.ChatCompletionMessageParam[] = [];
    if (systemPrompt) {
      messages.push({ role: 'system', content: systemPrompt });
    }
    messages.push({ role: 'user', content: prompt });

    const tokenLimit = requiresMaxCompletionTokens(this.model)
      ? { max_completion_tokens: maxTokens }
      : { max_tokens: maxTokens, temperature };

    try {
      const response = await withTimeout(
        this.clientFactory().chat.completions.create(
          { model: this.model, messages, ...tokenLimit },
          { timeout: this.timeoutMs, maxRetries: 0 }
        ),
        this.timeoutMs,
        'openai'
      );

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new ProviderError('openai', 'empty completion');
      }

      logger.debug('[TextCompleter] Completion received', {
        model: this.model,
        durationMs: Date.now() - started,
        tokens: response.usage?.total_tokens,
      });
      return content;
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new ProviderError('openai', message, { cause: error });
    }
  }
}

/**
 * Extract JSON from a completion, tolerating code fences and surrounding prose.
 */
export function extractJson(raw: string): unknown {
  const trimmed = raw.trim().replace(/^```(?:json)?\s*/i, '').replace(/\s*```$/, '');
  try {
    return JSON.parse(trimmed);
  } catch {
    const match = trimmed.match(/[[{][\s\S]*[\]}]/);
    if (!match) {
      throw new ProviderError('completion', 'response contained no JSON');
    }
    try {
      return JSON.parse(match[0]);
    } catch (error) {
      throw new ProviderError('completion', 'could not parse JSON from response', { cause: error });
    }
  }
}

/**
 * Complete a prompt and validate the JSON answer against a schema.
 */
export async function completeJson<T>(
  completer: TextCompleter,
  prompt: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options?: CompletionOptions
): Promise<T> {
  const raw = await completer.complete(prompt, options);
  const parsed = schema.safeParse(extractJson(raw));
  if (!parsed.success) {
    throw new ProviderError('completion', `response failed validation: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
  }
  return parsed.data;
}
