import { z } from 'zod';
import type {
  ActiveSubflow,
  BatchResolutionState,
  Candidate,
  ConversationMessage,
  DataRecord,
  FieldResolutionState,
  JsonValue,
  StackFrame,
  SubflowState,
  WorkflowContextData,
} from './index.js';

/**
 * Zod schemas for data validation
 */

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const DataRecordSchema: z.ZodType<DataRecord> = z.record(JsonValueSchema);

const EntityIdSchema = z.union([z.string(), z.number()]);

// Resolution config schemas
export const ResolutionConfigSchema = z.object({
  model: z.string().min(1),
  searchFields: z.array(z.string().min(1)).min(1).default(['name']),
  identifierField: z.string().min(1).optional(),
  quantityField: z.string().min(1).default('quantity'),
  interactive: z.boolean().default(true),
  confirmBeforeCreate: z.boolean().default(false),
  checkDuplicates: z.boolean().default(false),
  askOnDuplicate: z.boolean().default(true),
  filters: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])).default({}),
  subflow: z.string().min(1).optional(),
  includeFields: z.array(z.string()).default([]),
  baseFields: z.array(z.string()).default(['id', 'name']),
  requiredItemFields: z.array(z.string()).default([]),
  displayFields: z.array(z.string()).default([]),
  displayName: z.string().optional(),
  friendlyName: z.string().optional(),
  defaults: DataRecordSchema.default({}),
  /** Other collectedData keys that historically held this field's value; removed on persist. */
  aliasKeys: z.array(z.string()).default([]),
});

export type ResolutionConfigInput = z.input<typeof ResolutionConfigSchema>;
export type ResolutionConfig = z.output<typeof ResolutionConfigSchema>;

// Context schemas
export const CandidateSchema: z.ZodType<Candidate> = z.object({
  id: EntityIdSchema,
  fields: DataRecordSchema,
  similarityScore: z.number().min(0).max(100),
  matchedField: z.string(),
});

export const FieldResolutionStateSchema: z.ZodType<FieldResolutionState> = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('idle') }),
  z.object({
    kind: z.literal('awaiting_duplicate_choice'),
    identifier: z.string(),
    candidates: z.array(CandidateSchema),
  }),
  z.object({ kind: z.literal('awaiting_create_confirm'), identifier: z.string() }),
  z.object({ kind: z.literal('creating_via_subflow'), identifier: z.string() }),
  z.object({ kind: z.literal('done'), entityId: EntityIdSchema }),
]);

export const BatchResolutionStateSchema: z.ZodType<BatchResolutionState> = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('idle') }),
  z.object({
    kind: z.literal('awaiting_create_confirm'),
    validated: z.array(DataRecordSchema),
    missing: z.array(DataRecordSchema),
  }),
  z.object({
    kind: z.literal('creating_via_subflow'),
    validated: z.array(DataRecordSchema),
    missing: z.array(DataRecordSchema),
    index: z.number().int().min(0),
    current: z.string(),
  }),
  z.object({ kind: z.literal('done') }),
]);

export const ActiveSubflowSchema: z.ZodType<ActiveSubflow> = z.object({
  workflowId: z.string(),
  parentFieldName: z.string(),
  entityName: z.string(),
  stepPrefix: z.string(),
  mode: z.enum(['single', 'batch']),
  parentCollectedData: DataRecordSchema,
});

export const SubflowStateSchema: z.ZodType<SubflowState> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('none') }),
    z.object({ kind: z.literal('active'), subflow: ActiveSubflowSchema, outer: SubflowStateSchema }),
  ])
);

export const StackFrameSchema: z.ZodType<StackFrame> = z.object({
  workflow: z.string(),
  step: z.string(),
  activeSubflow: ActiveSubflowSchema.nullable(),
  collectedData: DataRecordSchema,
});

export const ConversationMessageSchema: z.ZodType<ConversationMessage> = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string(),
  timestamp: z.string().optional(),
});

export const WorkflowContextDataSchema: z.ZodType<WorkflowContextData> = z.object({
  sessionId: z.string().min(1),
  currentWorkflow: z.string().nullable(),
  currentStep: z.string().nullable(),
  collectedData: DataRecordSchema,
  slots: DataRecordSchema,
  fieldStates: z.record(FieldResolutionStateSchema),
  batchStates: z.record(BatchResolutionStateSchema),
  extractedData: z.record(DataRecordSchema),
  subflow: SubflowStateSchema,
  workflowStack: z.array(StackFrameSchema),
  conversationHistory: z.array(ConversationMessageSchema),
  updatedAt: z.string(),
});
