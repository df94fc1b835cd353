// src/types/index.ts

// ============================================================================
// JSON VALUES
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type DataRecord = { [key: string]: JsonValue };

export type EntityId = string | number;

export interface ConversationMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
  timestamp?: string;
}

// ============================================================================
// ENTITIES
// ============================================================================

export interface EntityRecord {
  id: EntityId;
  fields: DataRecord;
}

/**
 * A ranked entity-store hit. `similarityScore` is always within 0..100.
 */
export interface Candidate extends EntityRecord {
  similarityScore: number;
  matchedField: string;
}

export type EntityFilters = Record<string, JsonPrimitive>;

export interface TextMatch {
  fields: string[];
  terms: string[];
  mode: 'equals' | 'contains';
}

export interface EntityQuery {
  id?: EntityId;
  filters?: EntityFilters;
  match?: TextMatch;
}

// ============================================================================
// ACTION RESULTS
// ============================================================================

export type ResolutionErrorCode =
  | 'configuration'
  | 'not_found'
  | 'ambiguous_match'
  | 'provider'
  | 'user_declined'
  | 'workflow_stack'
  | 'unexpected';

export type AwaitingInput =
  | 'duplicate_choice'
  | 'create_confirmation'
  | 'batch_create_confirmation'
  | 'field_input'
  | 'subflow'
  | 'retry';

export interface CandidateSummary {
  id: EntityId;
  label: string;
  score: number;
}

/**
 * Machine-readable hints for the host. Never duplicates the user-facing message.
 */
export interface ResultMetadata {
  field?: string;
  error?: ResolutionErrorCode;
  awaiting?: AwaitingInput;
  candidates?: CandidateSummary[];
  missingFields?: string[];
  missingItems?: string[];
  subflow?: string;
  /** The step moved the workflow cursor and the runner should keep executing this turn. */
  continueTurn?: boolean;
}

export interface SuccessResult {
  status: 'success';
  message: string;
  data: DataRecord;
  metadata?: ResultMetadata;
}

export interface FailureResult {
  status: 'failure';
  error: string;
  metadata?: ResultMetadata;
}

export interface NeedsUserInputResult {
  status: 'needs_user_input';
  message: string;
  metadata: ResultMetadata;
}

export type ActionResult = SuccessResult | FailureResult | NeedsUserInputResult;

// ============================================================================
// WORKFLOW CONTEXT STATE
// ============================================================================

export type FieldResolutionState =
  | { kind: 'idle' }
  | { kind: 'awaiting_duplicate_choice'; identifier: string; candidates: Candidate[] }
  | { kind: 'awaiting_create_confirm'; identifier: string }
  | { kind: 'creating_via_subflow'; identifier: string }
  | { kind: 'done'; entityId: EntityId };

export type BatchResolutionState =
  | { kind: 'idle' }
  | { kind: 'awaiting_create_confirm'; validated: DataRecord[]; missing: DataRecord[] }
  | {
      kind: 'creating_via_subflow';
      validated: DataRecord[];
      missing: DataRecord[];
      /** Number of entities created so far in this batch. */
      index: number;
      /** Display name of the item the running subflow is creating. */
      current: string;
    }
  | { kind: 'done' };

export interface ActiveSubflow {
  workflowId: string;
  parentFieldName: string;
  entityName: string;
  stepPrefix: string;
  mode: 'single' | 'batch';
  parentCollectedData: DataRecord;
}

export type SubflowState =
  | { kind: 'none' }
  | { kind: 'active'; subflow: ActiveSubflow; outer: SubflowState };

export interface StackFrame {
  workflow: string;
  step: string;
  activeSubflow: ActiveSubflow | null;
  collectedData: DataRecord;
}

export interface WorkflowContextData {
  sessionId: string;
  currentWorkflow: string | null;
  currentStep: string | null;
  collectedData: DataRecord;
  slots: DataRecord;
  fieldStates: Record<string, FieldResolutionState>;
  batchStates: Record<string, BatchResolutionState>;
  extractedData: Record<string, DataRecord>;
  subflow: SubflowState;
  workflowStack: StackFrame[];
  conversationHistory: ConversationMessage[];
  updatedAt: string;
}

// ============================================================================
// RESOLUTION SCOPE
// ============================================================================

/**
 * Who the resolution runs for. Used to default workspace/creator columns on creation.
 */
export interface ResolutionScope {
  workspaceId?: EntityId;
  creatorId?: EntityId;
}

export type { ResolutionConfig, ResolutionConfigInput } from './schema.js';
