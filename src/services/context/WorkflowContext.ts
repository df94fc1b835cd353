import { CONTEXT_LIMITS } from '../../config/resolution.js';
import { ENVIRONMENT } from '../../config/environment.js';
import type {
  ActiveSubflow,
  BatchResolutionState,
  ConversationMessage,
  DataRecord,
  FieldResolutionState,
  JsonValue,
  StackFrame,
  SubflowState,
  WorkflowContextData,
} from '../../types/index.js';
import { WorkflowContextDataSchema } from '../../types/schema.js';
import { WorkflowStackError } from '../resolution/errors.js';

export interface WorkflowContextOptions {
  maxDepth?: number;
}

const IDLE_FIELD: FieldResolutionState = { kind: 'idle' };
const IDLE_BATCH: BatchResolutionState = { kind: 'idle' };

/**
 * Per-session conversational state carried between turns.
 *
 * Holds the workflow cursor, the workflow's collected data, typed per-field
 * resolution state, the subflow marker and the bounded stack of parent frames.
 * Everything here must survive a JSON round trip through a SessionStore.
 */
export class WorkflowContext {
  private data: WorkflowContextData;
  private readonly maxDepth: number;

  constructor(data: WorkflowContextData, options: WorkflowContextOptions = {}) {
    this.data = structuredClone(data);
    this.maxDepth = options.maxDepth ?? ENVIRONMENT.MAX_WORKFLOW_DEPTH;
  }

  static create(sessionId: string, options?: WorkflowContextOptions): WorkflowContext {
    return new WorkflowContext(
      {
        sessionId,
        currentWorkflow: null,
        currentStep: null,
        collectedData: {},
        slots: {},
        fieldStates: {},
        batchStates: {},
        extractedData: {},
        subflow: { kind: 'none' },
        workflowStack: [],
        conversationHistory: [],
        updatedAt: new Date().toISOString(),
      },
      options
    );
  }

  /**
   * Rebuild a context from persisted JSON. Rejects anything that does not match the schema.
   */
  static fromJSON(raw: unknown, options?: WorkflowContextOptions): WorkflowContext {
    const parsed = WorkflowContextDataSchema.safeParse(raw);
    if (!parsed.success) {
      const paths = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
      throw new Error(`Invalid persisted workflow context: ${paths}`);
    }
    return new WorkflowContext(parsed.data, options);
  }

  toJSON(): WorkflowContextData {
    return structuredClone(this.data);
  }

  // ==========================================================================
  // STAGING
  // ==========================================================================

  snapshot(): WorkflowContextData {
    return this.toJSON();
  }

  restore(snapshot: WorkflowContextData): void {
    this.data = structuredClone(snapshot);
  }

  touch(): void {
    this.data.updatedAt = new Date().toISOString();
  }

  // ==========================================================================
  // CURSOR
  // ==========================================================================

  get sessionId(): string {
    return this.data.sessionId;
  }

  get currentWorkflow(): string | null {
    return this.data.currentWorkflow;
  }

  get currentStep(): string | null {
    return this.data.currentStep;
  }

  setCursor(workflow: string | null, step: string | null): void {
    this.data.currentWorkflow = workflow;
    this.data.currentStep = step;
  }

  setCurrentStep(step: string | null): void {
    this.data.currentStep = step;
  }

  // ==========================================================================
  // COLLECTED DATA
  // ==========================================================================

  get collectedData(): Readonly<DataRecord> {
    return this.data.collectedData;
  }

  getCollected(key: string): JsonValue | undefined {
    return this.data.collectedData[key];
  }

  setCollected(key: string, value: JsonValue): void {
    this.data.collectedData[key] = value;
  }

  removeCollected(key: string): void {
    delete this.data.collectedData[key];
  }

  replaceCollectedData(data: DataRecord): void {
    this.data.collectedData = structuredClone(data);
  }

  // ==========================================================================
  // SLOTS (free-form scratch values)
  // ==========================================================================

  remember(key: string, value: JsonValue): void {
    this.data.slots[key] = value;
  }

  recall(key: string): JsonValue | undefined {
    return this.data.slots[key];
  }

  has(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.data.slots, key);
  }

  forget(key: string): void {
    delete this.data.slots[key];
  }

  // ==========================================================================
  // PER-FIELD RESOLUTION STATE
  // ==========================================================================

  fieldState(field: string): FieldResolutionState {
    return this.data.fieldStates[field] ?? IDLE_FIELD;
  }

  setFieldState(field: string, state: FieldResolutionState): void {
    if (state.kind === 'idle') {
      delete this.data.fieldStates[field];
      return;
    }
    this.data.fieldStates[field] = state;
  }

  batchState(field: string): BatchResolutionState {
    return this.data.batchStates[field] ?? IDLE_BATCH;
  }

  setBatchState(field: string, state: BatchResolutionState): void {
    if (state.kind === 'idle') {
      delete this.data.batchStates[field];
      return;
    }
    this.data.batchStates[field] = state;
  }

  extractedData(field: string): DataRecord {
    return this.data.extractedData[field] ?? {};
  }

  /**
   * Merge structured identifier data; earlier captures survive unless overwritten key by key.
   */
  mergeExtractedData(field: string, data: DataRecord): void {
    this.data.extractedData[field] = { ...this.extractedData(field), ...data };
  }

  clearField(field: string): void {
    delete this.data.fieldStates[field];
    delete this.data.batchStates[field];
    delete this.data.extractedData[field];
  }

  // ==========================================================================
  // SUBFLOWS AND THE WORKFLOW STACK
  // ==========================================================================

  get subflow(): SubflowState {
    return this.data.subflow;
  }

  activeSubflow(): ActiveSubflow | null {
    return this.data.subflow.kind === 'active' ? this.data.subflow.subflow : null;
  }

  beginSubflow(subflow: ActiveSubflow): void {
    this.data.subflow = { kind: 'active', subflow, outer: this.data.subflow };
  }

  /**
   * Clear the active subflow marker, reinstating the enclosing one (if any).
   */
  endSubflow(): ActiveSubflow | null {
    const state = this.data.subflow;
    if (state.kind === 'none') return null;
    this.data.subflow = state.outer;
    return state.subflow;
  }

  /**
   * True when a subflow started for `field` no longer owns the cursor.
   */
  isSubflowComplete(field: string): boolean {
    const active = this.activeSubflow();
    if (!active || active.parentFieldName !== field) return false;
    return !(this.data.currentStep ?? '').startsWith(active.stepPrefix);
  }

  get workflowStack(): readonly StackFrame[] {
    return this.data.workflowStack;
  }

  get stackDepth(): number {
    return this.data.workflowStack.length;
  }

  pushFrame(frame: StackFrame): void {
    if (this.data.workflowStack.length >= this.maxDepth) {
      throw new WorkflowStackError(`Workflow nesting exceeds the maximum depth of ${this.maxDepth}`);
    }
    this.data.workflowStack.push(structuredClone(frame));
  }

  popFrame(): StackFrame | null {
    return this.data.workflowStack.pop() ?? null;
  }

  peekFrame(): StackFrame | null {
    const stack = this.data.workflowStack;
    return stack.length > 0 ? stack[stack.length - 1] : null;
  }

  // ==========================================================================
  // CONVERSATION HISTORY
  // ==========================================================================

  get conversationHistory(): readonly ConversationMessage[] {
    return this.data.conversationHistory;
  }

  addMessage(role: ConversationMessage['role'], content: string): void {
    const history = this.data.conversationHistory;
    history.push({ role, content, timestamp: new Date().toISOString() });
    if (history.length > CONTEXT_LIMITS.MAX_HISTORY_MESSAGES) {
      history.splice(0, history.length - CONTEXT_LIMITS.MAX_HISTORY_MESSAGES);
    }
  }

  lastUserMessage(): string {
    for (let i = this.data.conversationHistory.length - 1; i >= 0; i--) {
      const message = this.data.conversationHistory[i];
      if (message.role === 'user') return message.content.trim();
    }
    return '';
  }
}
