import {
  COMPLETE,
  nextStepName,
  prefixedStepName,
  returnToParent,
  type WorkflowDefinition,
  type WorkflowRegistry,
} from '../../orchestration/WorkflowEngine.js';
import type {
  ActionResult,
  ActiveSubflow,
  DataRecord,
  EntityId,
  JsonValue,
  ResolutionConfig,
} from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import type { WorkflowContext } from '../context/WorkflowContext.js';
import { ConfigurationError } from './errors.js';
import { FriendlyNames } from './FriendlyNames.js';
import { ActionResults } from './results.js';

/** Slot a creation subflow writes the new entity's id to. */
export const CREATED_ENTITY_SLOT = 'created_entity_id';

export function createdEntitySlot(entityName: string): string {
  return `${entityName}_id`;
}

export interface StartSubflowRequest {
  field: string;
  config: ResolutionConfig;
  identifier: string;
  mode: 'single' | 'batch';
  /** Structured identifier fields captured earlier. */
  extracted?: DataRecord;
  /** Caller item fields to pass through (price, quantity, ...). */
  item?: DataRecord;
}

export interface SubflowCompletion {
  subflow: ActiveSubflow;
  entityId: EntityId | null;
  /** The subflow's collectedData at the moment it finished. */
  collected: DataRecord;
}

function asEntityId(value: JsonValue | undefined): EntityId | null {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') return value.trim();
  return null;
}

/**
 * Starts, detects completion of, and unwinds nested creation workflows.
 *
 * The parent's collectedData is snapshotted on start and the subflow runs on a
 * fresh record; on completion the parent's data comes back untouched and only
 * the created entity (plus fields the parent asked for) is merged by the caller.
 */
export class SubflowOrchestrator {
  constructor(
    private readonly workflows: WorkflowRegistry,
    private readonly names: FriendlyNames
  ) {}

  static stepPrefix(entityName: string, parentWorkflow: string): string {
    const parent = parentWorkflow.replace(/workflow$/i, '') || 'root';
    return `${entityName}_${parent}`.toLowerCase().replace(/[^a-z0-9]+/g, '_');
  }

  entityNameFor(field: string, config: ResolutionConfig, workflow: WorkflowDefinition): string {
    return workflow.entityName ?? this.names.forField(field, config).singular.replace(/\s+/g, '_');
  }

  async start(context: WorkflowContext, request: StartSubflowRequest): Promise<ActionResult> {
    const { field, config, identifier, mode } = request;
    if (!config.subflow) {
      throw new ConfigurationError(`Field "${field}" has no subflow configured`);
    }

    const workflow = this.workflows.get(config.subflow);
    const entityName = this.entityNameFor(field, config, workflow);
    const parentWorkflow = context.currentWorkflow ?? 'root';
    const stepPrefix = SubflowOrchestrator.stepPrefix(entityName, parentWorkflow);
    const entityFields = workflow.getEntityFields();

    context.pushFrame({
      workflow: parentWorkflow,
      step: context.currentStep ?? '',
      activeSubflow: context.activeSubflow(),
      collectedData: { ...context.collectedData },
    });

    const parentCollectedData: DataRecord = structuredClone({ ...context.collectedData });
    if (mode === 'batch') {
      for (const key of entityFields) {
        delete parentCollectedData[key];
        context.forget(key);
      }
    }
    context.forget(createdEntitySlot(entityName));
    context.forget(CREATED_ENTITY_SLOT);

    context.beginSubflow({
      workflowId: workflow.id,
      parentFieldName: field,
      entityName,
      stepPrefix,
      mode,
      parentCollectedData,
    });
    context.replaceCollectedData(this.buildInitialData(workflow, request));
    context.setCursor(workflow.id, prefixedStepName(stepPrefix, workflow.steps[0].name));

    logger.info(`🔀 [SubflowOrchestrator] Started ${workflow.id} for ${field}`, {
      sessionId: context.sessionId,
      identifier,
      stepPrefix,
      depth: context.stackDepth,
    });

    return this.executeFirstStep(context, workflow, stepPrefix, field);
  }

  /**
   * Fresh collectedData for the subflow: identifier, captured identifier fields, pass-through item fields
   */
  buildInitialData(workflow: WorkflowDefinition, request: StartSubflowRequest): DataRecord {
    const identifierField = workflow.identifierField ?? 'name';
    const declared = new Set(workflow.getEntityFields());
    const fieldMap = workflow.inputFieldMap ?? {};
    const skip = new Set([identifierField, 'name', request.config.identifierField ?? identifierField]);

    const data: DataRecord = {};
    for (const [key, value] of Object.entries({ ...(request.extracted ?? {}), ...(request.item ?? {}) })) {
      if (skip.has(key) || value === null) continue;
      const target = fieldMap[key] ?? key;
      if (declared.size === 0 || declared.has(target)) {
        data[target] = value;
      }
    }
    data[identifierField] = request.identifier;
    return data;
  }

  /**
   * True while the subflow started for `field` still owns the cursor
   */
  isRunning(context: WorkflowContext, field: string): boolean {
    const active = context.activeSubflow();
    return active !== null && active.parentFieldName === field && !context.isSubflowComplete(field);
  }

  /**
   * Collect the result of a finished subflow and restore the parent's data.
   * Returns null unless the subflow for `field` has handed the cursor back.
   */
  complete(context: WorkflowContext, field: string): SubflowCompletion | null {
    if (!context.isSubflowComplete(field)) return null;

    const collected: DataRecord = structuredClone({ ...context.collectedData });
    const subflow = context.endSubflow();
    if (!subflow) return null;

    const slot = createdEntitySlot(subflow.entityName);
    const entityId =
      asEntityId(context.recall(slot)) ??
      asEntityId(context.recall(CREATED_ENTITY_SLOT)) ??
      asEntityId(collected[slot]) ??
      asEntityId(collected.entity_id);

    context.forget(slot);
    context.forget(CREATED_ENTITY_SLOT);
    context.replaceCollectedData(subflow.parentCollectedData);

    logger.info(`✅ [SubflowOrchestrator] Subflow ${subflow.workflowId} completed for ${field}`, {
      sessionId: context.sessionId,
      entityId,
    });

    return { subflow, entityId, collected };
  }

  /**
   * Abandon the running subflow for `field`: cursor, marker and parent data are restored
   */
  abort(context: WorkflowContext, field: string): void {
    const active = context.activeSubflow();
    if (!active || active.parentFieldName !== field) return;

    if (!context.isSubflowComplete(field)) {
      returnToParent(context);
    }
    context.endSubflow();
    context.replaceCollectedData(active.parentCollectedData);
    context.forget(createdEntitySlot(active.entityName));
    context.forget(CREATED_ENTITY_SLOT);

    logger.warn(`⚠️ [SubflowOrchestrator] Subflow ${active.workflowId} aborted for ${field}`, {
      sessionId: context.sessionId,
    });
  }

  private async executeFirstStep(
    context: WorkflowContext,
    workflow: WorkflowDefinition,
    stepPrefix: string,
    field: string
  ): Promise<ActionResult> {
    const step = workflow.steps[0];
    const result = await step.execute(context, { message: null });

    if (result.status === 'needs_user_input') {
      return { ...result, metadata: { ...result.metadata, field, subflow: workflow.id } };
    }

    const next = nextStepName(workflow, step, result);
    if (result.status === 'failure' && next === null) {
      logger.warn(`❌ [SubflowOrchestrator] First step of ${workflow.id} failed`, { error: result.error });
      this.abort(context, field);
      const name = this.names.forField(field);
      return ActionResults.needsUserInput(
        `I couldn't start creating the ${name.singular}: ${result.error}. Would you like to try again?`,
        { field, error: 'unexpected', awaiting: 'retry', subflow: workflow.id }
      );
    }

    if (next === COMPLETE) {
      returnToParent(context);
    } else if (next !== null) {
      context.setCurrentStep(prefixedStepName(stepPrefix, next));
    }
    return ActionResults.needsUserInput('', { field, awaiting: 'subflow', subflow: workflow.id, continueTurn: true });
  }
}
