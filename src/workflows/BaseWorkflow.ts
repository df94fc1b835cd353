import type { WorkflowDefinition, WorkflowStep } from '../orchestration/WorkflowEngine.js';

/**
 * Base for workflows defined as classes. Steps are built on first use so
 * subclasses can rely on their own constructor fields.
 */
export abstract class BaseWorkflow implements WorkflowDefinition {
  abstract readonly id: string;
  readonly entityName?: string;
  readonly identifierField?: string;
  readonly inputFieldMap?: Record<string, string>;

  private builtSteps: WorkflowStep[] | null = null;

  get steps(): WorkflowStep[] {
    if (!this.builtSteps) {
      this.builtSteps = this.initializeSteps();
    }
    return this.builtSteps;
  }

  /**
   * Ordered steps of the workflow - to be implemented by subclasses
   */
  protected abstract initializeSteps(): WorkflowStep[];

  abstract getEntityFields(): string[];
}
