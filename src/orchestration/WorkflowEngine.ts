import { ENVIRONMENT } from '../config/environment.js';
import type { ActionResult, SubflowState } from '../types/index.js';
import { logger } from '../utils/logger.js';
import type { WorkflowContext } from '../services/context/WorkflowContext.js';
import { ConfigurationError, WorkflowStackError } from '../services/resolution/errors.js';
import { ActionResults } from '../services/resolution/results.js';

/** Terminal pseudo-step name. */
export const COMPLETE = 'complete';

export interface StepTurn {
  /** The user's message, only for the first step executed in a turn. */
  message: string | null;
}

export interface WorkflowStep {
  name: string;
  execute: (context: WorkflowContext, turn: StepTurn) => Promise<ActionResult>;
  /** Next step on success. Defaults to the following step, or COMPLETE after the last. */
  onSuccess?: string;
  /** Step to run on failure. Without one the failure ends the turn. */
  onFailure?: string;
}

export interface WorkflowDefinition {
  id: string;
  /** Entity a subflow creates, e.g. "product". */
  entityName?: string;
  /** Field that receives the identifier when started as a subflow. Defaults to "name". */
  identifierField?: string;
  /** Renames caller item fields on the way in, e.g. { price: 'sale_price' }. */
  inputFieldMap?: Record<string, string>;
  steps: WorkflowStep[];
  /** Fields this workflow owns in collectedData. */
  getEntityFields(): string[];
}

export class WorkflowRegistry {
  private readonly workflows = new Map<string, WorkflowDefinition>();

  constructor(workflows: WorkflowDefinition[] = []) {
    workflows.forEach((workflow) => this.register(workflow));
  }

  register(workflow: WorkflowDefinition): this {
    if (workflow.steps.length === 0) {
      throw new ConfigurationError(`Workflow "${workflow.id}" has no steps`);
    }
    this.workflows.set(workflow.id, workflow);
    return this;
  }

  has(id: string): boolean {
    return this.workflows.has(id);
  }

  get(id: string): WorkflowDefinition {
    const workflow = this.workflows.get(id);
    if (!workflow) {
      throw new ConfigurationError(`Workflow "${id}" is not registered`);
    }
    return workflow;
  }
}

// ============================================================================
// CURSOR HELPERS
// ============================================================================

export function prefixedStepName(prefix: string | null, step: string): string {
  return prefix ? `${prefix}_${step}` : step;
}

/**
 * Prefix under which `workflowId` currently runs as a subflow, searching the nested chain
 */
export function activePrefixFor(state: SubflowState, workflowId: string, step: string): string | null {
  let current = state;
  while (current.kind === 'active') {
    const { subflow } = current;
    if (subflow.workflowId === workflowId && step.startsWith(`${subflow.stepPrefix}_`)) {
      return subflow.stepPrefix;
    }
    current = current.outer;
  }
  return null;
}

export interface LocatedStep {
  workflow: WorkflowDefinition;
  step: WorkflowStep;
  prefix: string | null;
}

export function locateStep(context: WorkflowContext, workflows: WorkflowRegistry): LocatedStep {
  const workflowId = context.currentWorkflow;
  const stepName = context.currentStep;
  if (!workflowId || !stepName) {
    throw new WorkflowStackError('No workflow step is active');
  }

  const workflow = workflows.get(workflowId);
  const prefix = activePrefixFor(context.subflow, workflowId, stepName);
  const bare = prefix ? stepName.slice(prefix.length + 1) : stepName;
  const step = workflow.steps.find((candidate) => candidate.name === bare);
  if (!step) {
    throw new ConfigurationError(`Workflow "${workflowId}" has no step "${bare}"`);
  }
  return { workflow, step, prefix };
}

/**
 * Name of the step that follows `step` after `result`, COMPLETE, or null when the turn should end
 */
export function nextStepName(workflow: WorkflowDefinition, step: WorkflowStep, result: ActionResult): string | null {
  if (result.status === 'failure') {
    return step.onFailure ?? null;
  }
  if (step.onSuccess) return step.onSuccess;

  const index = workflow.steps.indexOf(step);
  const following = workflow.steps[index + 1];
  return following ? following.name : COMPLETE;
}

/**
 * Hand the cursor back to the workflow that started the running subflow.
 * The subflow marker stays so the parent's resolver can detect completion.
 */
export function returnToParent(context: WorkflowContext): void {
  const frame = context.popFrame();
  if (!frame) {
    throw new WorkflowStackError('Subflow completed with an empty workflow stack');
  }
  context.setCursor(frame.workflow, frame.step);
}

// ============================================================================
// RUNNER
// ============================================================================

/**
 * Executes workflow steps for one conversational turn: chains successful steps,
 * stops at the first question, and resumes the parent when a subflow completes.
 */
export class WorkflowRunner {
  constructor(
    private readonly workflows: WorkflowRegistry,
    private readonly maxStepsPerTurn: number = ENVIRONMENT.MAX_STEPS_PER_TURN
  ) {}

  async start(context: WorkflowContext, workflowId: string, message: string | null = null): Promise<ActionResult> {
    const workflow = this.workflows.get(workflowId);
    context.setCursor(workflow.id, workflow.steps[0].name);
    logger.info(`🚀 [WorkflowRunner] Starting workflow ${workflow.id}`, { sessionId: context.sessionId });
    return this.runTurn(context, message);
  }

  async runTurn(context: WorkflowContext, message: string | null): Promise<ActionResult> {
    if (message !== null && message.trim() !== '') {
      context.addMessage('user', message.trim());
    }
    if (!context.currentWorkflow) {
      return ActionResults.failure('No active workflow');
    }

    let turn: StepTurn = { message: message?.trim() || null };

    for (let executed = 0; executed < this.maxStepsPerTurn; executed++) {
      const { workflow, step, prefix } = locateStep(context, this.workflows);

      logger.debug(`📋 [WorkflowRunner] Executing step ${workflow.id}.${step.name}`, { prefix });
      const result = await step.execute(context, turn);
      turn = { message: null };

      if (result.status === 'needs_user_input') {
        if (result.metadata.continueTurn) continue;
        context.addMessage('assistant', result.message);
        return result;
      }

      const next = nextStepName(workflow, step, result);
      if (next === null) {
        logger.warn(`❌ [WorkflowRunner] Step failed: ${workflow.id}.${step.name}`, {
          error: result.status === 'failure' ? result.error : undefined,
        });
        if (result.status === 'failure') context.addMessage('assistant', result.error);
        return result;
      }

      if (next === COMPLETE) {
        if (prefix !== null) {
          logger.info(`↩️ [WorkflowRunner] Subflow ${workflow.id} completed, resuming parent`);
          returnToParent(context);
          continue;
        }
        logger.info(`✅ [WorkflowRunner] Workflow ${workflow.id} completed`);
        context.setCursor(null, null);
        context.addMessage('assistant', result.status === 'success' ? result.message : result.error);
        return result;
      }

      context.setCurrentStep(prefixedStepName(prefix, next));
    }

    logger.error('[WorkflowRunner] Step limit reached in a single turn', {
      sessionId: context.sessionId,
      limit: this.maxStepsPerTurn,
    });
    return ActionResults.failure(`Workflow exceeded ${this.maxStepsPerTurn} steps in one turn`, { error: 'workflow_stack' });
  }
}
