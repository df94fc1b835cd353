import { ENVIRONMENT } from '../config/environment.js';
import type { HumanInTheLoop } from '../orchestration/HumanInTheLoop.js';
import type { StepTurn, WorkflowStep } from '../orchestration/WorkflowEngine.js';
import type { WorkflowContext } from '../services/context/WorkflowContext.js';
import type { BatchItems } from '../services/resolution/BatchEntityResolver.js';
import type { DataExtractor, FieldSpec } from '../services/resolution/DataExtractor.js';
import type { EntityIdentifier } from '../services/resolution/EntityResolver.js';
import { HeuristicIntentInterpreter } from '../services/resolution/IntentInterpreter.js';
import type { ResolutionEngine } from '../services/resolution/ResolutionEngine.js';
import { ActionResults } from '../services/resolution/results.js';
import { CREATED_ENTITY_SLOT, createdEntitySlot } from '../services/resolution/SubflowOrchestrator.js';
import type { EntityStoreRegistry } from '../services/store/EntityStore.js';
import type { ActionResult, DataRecord, JsonValue, ResolutionConfig } from '../types/index.js';
import { errorMeta, logger } from '../utils/logger.js';
import { TextUtils } from '../utils/text.js';
import { withTimeout } from '../utils/timeout.js';

// ============================================================================
// HELPERS
// ============================================================================

function isRecord(value: JsonValue | undefined): value is DataRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toBatchItems(value: JsonValue | undefined): BatchItems | null {
  if (typeof value === 'string') return value.trim() ? value : null;
  if (!Array.isArray(value)) return null;

  const items: Array<string | DataRecord> = [];
  for (const entry of value) {
    if (typeof entry === 'string' || isRecord(entry)) items.push(entry);
  }
  return items.length > 0 ? items : null;
}

function referenceSlot(field: string): string {
  return `${field}_reference`;
}

function subflowBelongsTo(context: WorkflowContext, field: string): boolean {
  return context.activeSubflow()?.parentFieldName === field;
}

/**
 * Reference to resolve on a fresh attempt: the configured collectedData key, else the user's message
 */
function freshReference(context: WorkflowContext, turn: StepTurn, input?: string): JsonValue | null {
  if (input) {
    const seeded = context.getCollected(input);
    if (seeded !== undefined && seeded !== null && seeded !== '') return seeded;
  }
  return turn.message;
}

type RetryDecision = { kind: 'retry'; reference: JsonValue } | { kind: 'cancel' } | { kind: 'fresh' };

/**
 * After a retry prompt, "yes" repeats the stored reference, "no" cancels, anything else is a new reference.
 */
function retryDecision(context: WorkflowContext, field: string, turn: StepTurn): RetryDecision {
  const stored = context.recall(referenceSlot(field));
  if (stored === undefined || turn.message === null) return { kind: 'fresh' };

  const intent = HeuristicIntentInterpreter.classifyConfirmation(turn.message);
  if (intent.kind === 'confirm') return { kind: 'retry', reference: stored };
  if (intent.kind === 'decline') return { kind: 'cancel' };
  return { kind: 'fresh' };
}

function settleReference(context: WorkflowContext, field: string, reference: JsonValue, result: ActionResult): void {
  if (result.status === 'needs_user_input') {
    context.remember(referenceSlot(field), reference);
  } else {
    context.forget(referenceSlot(field));
  }
}

// ============================================================================
// RESOLUTION STEPS
// ============================================================================

export interface ResolveEntityStepOptions {
  name: string;
  field: string;
  config: ResolutionConfig;
  /** collectedData key the host may seed with the raw reference. */
  input?: string;
  /** Question asked when there is nothing to resolve yet. */
  prompt: string;
}

/**
 * Resolve one entity reference. While the field is mid-resolution every reply goes to the resolver.
 */
export function resolveEntityStep(engine: ResolutionEngine, options: ResolveEntityStepOptions): WorkflowStep {
  const { field, config } = options;

  return {
    name: options.name,
    execute: async (context, turn) => {
      const state = context.fieldState(field);
      const stored = context.recall(referenceSlot(field));
      const pending = state.kind !== 'idle' && state.kind !== 'done';

      if (pending || subflowBelongsTo(context, field)) {
        const reference: EntityIdentifier = isRecord(stored) ? stored : TextUtils.asText(stored ?? null) ?? '';
        const result = await engine.resolve(field, config, reference, context);
        settleReference(context, field, reference, result);
        return result;
      }

      const decision = retryDecision(context, field, turn);
      if (decision.kind === 'cancel') {
        context.forget(referenceSlot(field));
        return ActionResults.failure('Entity creation cancelled by user', { field, error: 'user_declined' });
      }

      const raw = decision.kind === 'retry' ? decision.reference : freshReference(context, turn, options.input);
      const reference: EntityIdentifier | null = isRecord(raw) ? raw : TextUtils.asText(raw);
      if (reference === null) {
        return ActionResults.needsUserInput(options.prompt, { field, awaiting: 'field_input' });
      }

      const result = await engine.resolve(field, config, reference, context);
      settleReference(context, field, reference, result);
      return result;
    },
  };
}

export interface ResolveBatchStepOptions {
  name: string;
  field: string;
  config: ResolutionConfig;
  input?: string;
  prompt: string;
}

/**
 * Resolve a list of entity references held in collectedData or typed by the user
 */
export function resolveBatchStep(engine: ResolutionEngine, options: ResolveBatchStepOptions): WorkflowStep {
  const { field, config } = options;

  return {
    name: options.name,
    execute: async (context, turn) => {
      const state = context.batchState(field);
      const pending = state.kind === 'awaiting_create_confirm' || state.kind === 'creating_via_subflow';

      if (pending || subflowBelongsTo(context, field)) {
        const result = await engine.resolveBatch(field, config, [], context);
        if (result.status !== 'needs_user_input') context.forget(referenceSlot(field));
        return result;
      }

      const decision = retryDecision(context, field, turn);
      if (decision.kind === 'cancel') {
        context.forget(referenceSlot(field));
        return ActionResults.failure('Entity creation cancelled by user', { field, error: 'user_declined' });
      }

      const raw = decision.kind === 'retry' ? decision.reference : freshReference(context, turn, options.input);
      const items = toBatchItems(raw);
      if (items === null) {
        return ActionResults.needsUserInput(options.prompt, { field, awaiting: 'field_input' });
      }

      const result = await engine.resolveBatch(field, config, items, context);
      settleReference(context, field, raw, result);
      return result;
    },
  };
}

// ============================================================================
// CREATION STEPS
// ============================================================================

export interface CollectFieldsStepOptions {
  name: string;
  entity: string;
  fields: FieldSpec[];
  identifierField?: string;
}

/**
 * Ask for whatever required fields are still missing, reading answers out of each reply
 */
export function collectFieldsStep(
  extractor: DataExtractor,
  prompts: HumanInTheLoop,
  options: CollectFieldsStepOptions
): WorkflowStep {
  const missingFields = (context: WorkflowContext): FieldSpec[] =>
    options.fields.filter((field) => {
      if (field.required === false) return false;
      const value = context.getCollected(field.name);
      return value === undefined || value === null || value === '';
    });

  return {
    name: options.name,
    execute: async (context, turn) => {
      let missing = missingFields(context);

      if (turn.message && missing.length > 0) {
        const extracted = await extractor.extractFields(turn.message, missing);
        for (const [key, value] of Object.entries(extracted)) {
          context.setCollected(key, value);
        }
        missing = missingFields(context);
      }

      if (missing.length === 0) {
        return ActionResults.success(`Collected ${options.entity} details`, { ...context.collectedData });
      }

      return ActionResults.needsUserInput(
        prompts.buildFieldRequestMessage(options.entity, missing, context.collectedData, options.identifierField ?? 'name'),
        { awaiting: 'field_input', missingFields: missing.map((field) => field.name) }
      );
    },
  };
}

export interface CreateEntityStepOptions {
  name: string;
  entity: string;
  model: string;
  /** collectedData keys written to the new record. */
  fields: string[];
}

/**
 * Persist the collected fields and hand the new id to whoever started this workflow
 */
export function createEntityStep(stores: EntityStoreRegistry, options: CreateEntityStepOptions): WorkflowStep {
  return {
    name: options.name,
    execute: async (context) => {
      const store = stores.get(options.model);
      const fields: DataRecord = {};
      for (const key of options.fields) {
        const value = context.getCollected(key);
        if (value !== undefined && value !== null) fields[key] = value;
      }

      try {
        const record = await withTimeout(store.create(fields), ENVIRONMENT.STORE_TIMEOUT_MS, `${options.model} store`);
        context.remember(createdEntitySlot(options.entity), record.id);
        context.remember(CREATED_ENTITY_SLOT, record.id);
        context.setCollected(createdEntitySlot(options.entity), record.id);

        logger.info(`💾 [createEntityStep] Saved ${options.entity}`, { id: record.id });
        return ActionResults.success(`Saved ${options.entity}`, { id: record.id, ...fields });
      } catch (error) {
        logger.error(`❌ [createEntityStep] Could not save ${options.entity}`, errorMeta(error));
        return ActionResults.needsUserInput(
          `I couldn't save the ${options.entity}. Reply with anything to try again.`,
          { awaiting: 'retry', error: 'provider' }
        );
      }
    },
  };
}
