import { ENVIRONMENT } from './config/environment.js';
import { isAIConfigured } from './config/openai.js';
import { HumanInTheLoop } from './orchestration/HumanInTheLoop.js';
import { WorkflowRegistry, WorkflowRunner, type WorkflowDefinition } from './orchestration/WorkflowEngine.js';
import { OpenAITextCompleter, type TextCompleter } from './services/ai/TextCompleter.js';
import { BatchEntityResolver } from './services/resolution/BatchEntityResolver.js';
import { DataExtractor } from './services/resolution/DataExtractor.js';
import { AIDuplicateReranker, DuplicateRanker } from './services/resolution/DuplicateRanker.js';
import { EntityLookup } from './services/resolution/EntityLookup.js';
import { EntityResolver } from './services/resolution/EntityResolver.js';
import { FriendlyNames, type FriendlyName } from './services/resolution/FriendlyNames.js';
import {
  AIIntentInterpreter,
  FallbackIntentInterpreter,
  HeuristicIntentInterpreter,
  type IntentInterpreter,
} from './services/resolution/IntentInterpreter.js';
import { ResolutionEngine } from './services/resolution/ResolutionEngine.js';
import { SubflowOrchestrator } from './services/resolution/SubflowOrchestrator.js';
import { EntityStoreRegistry, type EntityStore } from './services/store/EntityStore.js';
import type { ResolutionScope } from './types/index.js';
import { logger } from './utils/logger.js';

export * from './types/index.js';
export { defineResolutionConfig, RESOLUTION_THRESHOLDS } from './config/resolution.js';
export { ConversationTurnRunner } from './orchestration/ConversationTurnRunner.js';
export { HumanInTheLoop } from './orchestration/HumanInTheLoop.js';
export { StateMachine } from './orchestration/StateMachine.js';
export {
  COMPLETE,
  WorkflowRegistry,
  WorkflowRunner,
  type StepTurn,
  type WorkflowDefinition,
  type WorkflowStep,
} from './orchestration/WorkflowEngine.js';
export { OpenAITextCompleter, type TextCompleter } from './services/ai/TextCompleter.js';
export { SessionLock } from './services/concurrency/SessionLock.js';
export { InMemorySessionStore, PgSessionStore, type SessionStore } from './services/context/SessionStore.js';
export { WorkflowContext } from './services/context/WorkflowContext.js';
export { BatchEntityResolver } from './services/resolution/BatchEntityResolver.js';
export { DataExtractor } from './services/resolution/DataExtractor.js';
export { DuplicateRanker } from './services/resolution/DuplicateRanker.js';
export { EntityResolver } from './services/resolution/EntityResolver.js';
export * from './services/resolution/errors.js';
export { FriendlyNames } from './services/resolution/FriendlyNames.js';
export { FallbackIntentInterpreter, HeuristicIntentInterpreter } from './services/resolution/IntentInterpreter.js';
export { ResolutionEngine } from './services/resolution/ResolutionEngine.js';
export { ActionResults, isSuccess, isTerminal } from './services/resolution/results.js';
export { SubflowOrchestrator } from './services/resolution/SubflowOrchestrator.js';
export { EntityStoreRegistry, type EntityStore } from './services/store/EntityStore.js';
export { InMemoryEntityStore } from './services/store/InMemoryEntityStore.js';
export { PgEntityStore } from './services/store/PgEntityStore.js';
export { registerSampleWorkflows } from './workflows/index.js';

export interface ResolutionEngineOptions {
  stores: EntityStore[] | EntityStoreRegistry;
  workflows?: WorkflowDefinition[];
  /** Completion provider. `null` disables every AI path; omitted means OpenAI when a key is configured. */
  completer?: TextCompleter | null;
  scope?: ResolutionScope;
  friendlyNames?: Record<string, FriendlyName>;
  maxStepsPerTurn?: number;
}

/**
 * Everything a host needs to drive resolution, wired with shared collaborators
 */
export interface ResolutionRuntime {
  engine: ResolutionEngine;
  runner: WorkflowRunner;
  workflows: WorkflowRegistry;
  stores: EntityStoreRegistry;
  extractor: DataExtractor;
  prompts: HumanInTheLoop;
  names: FriendlyNames;
}

function defaultCompleter(): TextCompleter | null {
  const wanted = ENVIRONMENT.AI_INTENT_ENABLED || ENVIRONMENT.AI_RERANK_ENABLED || ENVIRONMENT.AI_EXTRACTION_ENABLED;
  return wanted && isAIConfigured() ? new OpenAITextCompleter() : null;
}

export function createResolutionEngine(options: ResolutionEngineOptions): ResolutionRuntime {
  const stores = options.stores instanceof EntityStoreRegistry ? options.stores : new EntityStoreRegistry(options.stores);
  const workflows = new WorkflowRegistry(options.workflows ?? []);
  const completer = options.completer === undefined ? defaultCompleter() : options.completer;

  const interpreter: IntentInterpreter = new FallbackIntentInterpreter(
    new HeuristicIntentInterpreter(),
    completer && ENVIRONMENT.AI_INTENT_ENABLED ? new AIIntentInterpreter(completer) : undefined
  );
  const ranker = new DuplicateRanker(
    completer && ENVIRONMENT.AI_RERANK_ENABLED ? new AIDuplicateReranker(completer) : undefined
  );
  const extractor = new DataExtractor(completer && ENVIRONMENT.AI_EXTRACTION_ENABLED ? completer : undefined);

  const names = new FriendlyNames(options.friendlyNames);
  const prompts = new HumanInTheLoop();
  const lookup = new EntityLookup(options.scope);
  const subflows = new SubflowOrchestrator(workflows, names);

  const single = new EntityResolver({ stores, lookup, ranker, interpreter, subflows, names, prompts });
  const batch = new BatchEntityResolver({ stores, lookup, interpreter, extractor, subflows, names, prompts });
  const engine = new ResolutionEngine(single, batch, names);
  const runner = new WorkflowRunner(workflows, options.maxStepsPerTurn);

  logger.info('🚀 [ResolutionEngine] Initialized', { models: stores.models(), ai: completer !== null });
  return { engine, runner, workflows, stores, extractor, prompts, names };
}
