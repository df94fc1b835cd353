import { createResolutionEngine, registerSampleWorkflows, type ResolutionRuntime } from '../../src/index.js';
import type { TextCompleter } from '../../src/services/ai/TextCompleter.js';
import { InMemoryEntityStore } from '../../src/services/store/InMemoryEntityStore.js';
import type { DataRecord, ResolutionScope } from '../../src/types/index.js';

// ============================================================================
// TEST HELPERS
// ============================================================================

/**
 * Completer that answers from a script, in order. An Error entry is thrown instead.
 */
export class ScriptedCompleter implements TextCompleter {
  readonly prompts: string[] = [];

  constructor(private readonly replies: Array<string | Error>) {}

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const next = this.replies.shift();
    if (next === undefined) throw new Error('no scripted reply left');
    if (next instanceof Error) throw next;
    return next;
  }
}

export interface TestRuntime {
  runtime: ResolutionRuntime;
  products: InMemoryEntityStore;
  customers: InMemoryEntityStore;
}

export interface TestRuntimeOptions {
  products?: DataRecord[];
  customers?: DataRecord[];
  scope?: ResolutionScope;
}

export function createTestRuntime(options: TestRuntimeOptions = {}): TestRuntime {
  const products = new InMemoryEntityStore('product', {
    writableFields: ['name', 'price', 'sku'],
    records: (options.products ?? []).map((fields) => ({ fields })),
  });
  const customers = new InMemoryEntityStore('customer', {
    writableFields: ['name', 'email', 'phone', 'workspace_id', 'created_by'],
    records: (options.customers ?? []).map((fields) => ({ fields })),
  });

  const runtime = createResolutionEngine({ stores: [products, customers], completer: null, scope: options.scope });
  registerSampleWorkflows(runtime);
  return { runtime, products, customers };
}
