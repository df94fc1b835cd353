import { ProviderError } from '../services/resolution/errors.js';

/**
 * Race a promise against a timer. The timer is always cleared.
 */
export async function withTimeout<T>(operation: Promise<T>, timeoutMs: number, provider: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ProviderError(provider, `timed out after ${timeoutMs}ms`)), timeoutMs);
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
