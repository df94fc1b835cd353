import type { HumanInTheLoop, MissingItemLine } from '../../orchestration/HumanInTheLoop.js';
import type { ActionResult, DataRecord, EntityRecord, ResolutionConfig } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { TextUtils } from '../../utils/text.js';
import type { WorkflowContext } from '../context/WorkflowContext.js';
import type { EntityStore, EntityStoreRegistry } from '../store/EntityStore.js';
import { DataExtractor, type ItemFieldNames } from './DataExtractor.js';
import { EntityLookup } from './EntityLookup.js';
import { pickFields } from './EntityResolver.js';
import { UserDeclinedError } from './errors.js';
import type { FriendlyName, FriendlyNames } from './FriendlyNames.js';
import type { IntentInterpreter } from './IntentInterpreter.js';
import { ActionResults } from './results.js';
import type { SubflowCompletion, SubflowOrchestrator } from './SubflowOrchestrator.js';

export interface BatchEntityResolverDependencies {
  stores: EntityStoreRegistry;
  lookup: EntityLookup;
  interpreter: IntentInterpreter;
  extractor: DataExtractor;
  subflows: SubflowOrchestrator;
  names: FriendlyNames;
  prompts: HumanInTheLoop;
}

/** A free-text list, or items that are each free text or already structured. */
export type BatchItems = string | ReadonlyArray<string | DataRecord>;

interface BatchRun {
  field: string;
  config: ResolutionConfig;
  store: EntityStore;
  name: FriendlyName;
  context: WorkflowContext;
}

interface Partition {
  validated: DataRecord[];
  missing: DataRecord[];
}

/**
 * Resolves a list of entity references (invoice lines, order items) as one unit.
 *
 * Every item ends up in exactly one of `validated` or `missing`. Missing items
 * are created after a single confirmation, one creation per distinct name, and
 * move to `validated` as each creation finishes.
 */
export class BatchEntityResolver {
  constructor(private readonly deps: BatchEntityResolverDependencies) {}

  async resolveBatch(
    field: string,
    config: ResolutionConfig,
    items: BatchItems,
    context: WorkflowContext
  ): Promise<ActionResult> {
    const run: BatchRun = {
      field,
      config,
      store: this.deps.stores.get(config.model),
      name: this.deps.names.forField(field, config),
      context,
    };

    if (this.deps.subflows.isRunning(context, field)) {
      return ActionResults.needsUserInput(`Let's finish creating the ${run.name.singular} first.`, {
        field,
        awaiting: 'subflow',
        subflow: config.subflow,
      });
    }

    const completion = this.deps.subflows.complete(context, field);
    if (completion) {
      return this.afterSubflow(run, completion);
    }

    const state = context.batchState(field);
    switch (state.kind) {
      case 'awaiting_create_confirm':
        return this.handleConfirmation(run, state.validated, state.missing);
      case 'creating_via_subflow':
        logger.warn(`⚠️ [BatchEntityResolver] Lost subflow for ${field}, validating items again`);
        context.setBatchState(field, { kind: 'idle' });
        break;
      default:
        break;
    }

    return this.process(run, this.normalizeItems(items, config));
  }

  // ==========================================================================
  // PARTITION
  // ==========================================================================

  static itemFieldNames(config: ResolutionConfig): ItemFieldNames {
    return { identifierField: EntityLookup.itemIdentifierField(config), quantityField: config.quantityField };
  }

  normalizeItems(items: BatchItems, config: ResolutionConfig): DataRecord[] {
    const names = BatchEntityResolver.itemFieldNames(config);
    if (typeof items === 'string') {
      return DataExtractor.parseItems(items, names);
    }

    return items.map((item) => {
      if (typeof item !== 'string') return { ...item };
      const parsed = DataExtractor.parseItem(item, names);
      if (TextUtils.asText(parsed[names.identifierField]) === null && item.trim()) {
        parsed[names.identifierField] = item.trim();
      }
      return parsed;
    });
  }

  /**
   * Exact search per item. Found items merge base and included fields under the user's own values.
   */
  async partition(run: BatchRun, items: DataRecord[]): Promise<Partition> {
    const { config, store } = run;
    const partition: Partition = { validated: [], missing: [] };

    for (const item of items) {
      const identifier = EntityLookup.searchValueOf(item, config);
      const record = identifier ? await this.deps.lookup.exactMatch(store, config, identifier) : null;

      if (record) {
        partition.validated.push(this.mergeValidated(config, record, item));
      } else {
        partition.missing.push(item);
      }
    }

    logger.info(`📦 [BatchEntityResolver] ${run.field}: ${partition.validated.length} found, ${partition.missing.length} missing`);
    return partition;
  }

  private mergeValidated(config: ResolutionConfig, record: EntityRecord, item: DataRecord, entered: DataRecord = {}): DataRecord {
    const merged: DataRecord = {
      ...EntityLookup.project(record, config.baseFields),
      ...EntityLookup.project(record, config.includeFields),
      ...item,
      ...entered,
      id: record.id,
    };
    if (merged[config.quantityField] === undefined || merged[config.quantityField] === null) {
      merged[config.quantityField] = 1;
    }
    return merged;
  }

  private displayName(item: DataRecord, run: BatchRun): string {
    return (
      EntityLookup.searchValueOf(item, run.config) ??
      TextUtils.extractEntityName(item, run.name.singular)
    );
  }

  private async process(run: BatchRun, items: DataRecord[]): Promise<ActionResult> {
    const { field, config, context } = run;
    const { validated, missing } = await this.partition(run, items);

    if (missing.length === 0) {
      return this.finalize(run, validated, 0);
    }

    if (config.interactive || config.confirmBeforeCreate) {
      context.setBatchState(field, { kind: 'awaiting_create_confirm', validated, missing });
      return this.confirmationPrompt(run, missing);
    }

    return this.createDirectly(run, validated, missing, 0);
  }

  // ==========================================================================
  // CONFIRMATION
  // ==========================================================================

  private missingLines(run: BatchRun, missing: DataRecord[]): MissingItemLine[] {
    const lines = new Map<string, MissingItemLine>();
    for (const item of missing) {
      const name = this.displayName(item, run);
      const raw = item[run.config.quantityField];
      const quantity = typeof raw === 'number' ? raw : 1;
      const line = lines.get(name);
      if (line) {
        line.quantity += quantity;
      } else {
        lines.set(name, { name, quantity });
      }
    }
    return [...lines.values()];
  }

  private confirmationPrompt(run: BatchRun, missing: DataRecord[]): ActionResult {
    const lines = this.missingLines(run, missing);
    return ActionResults.needsUserInput(this.deps.prompts.buildBatchCreateConfirmationMessage(run.name, lines), {
      field: run.field,
      awaiting: 'batch_create_confirmation',
      error: 'not_found',
      missingItems: lines.map((line) => line.name),
    });
  }

  private async handleConfirmation(run: BatchRun, validated: DataRecord[], missing: DataRecord[]): Promise<ActionResult> {
    const { field, config, context } = run;
    const intent = await this.deps.interpreter.interpretConfirmation(context.lastUserMessage());

    switch (intent.kind) {
      case 'confirm':
        return this.nextCreation(run, validated, missing, 0);
      case 'decline': {
        context.clearField(field);
        const declined = new UserDeclinedError();
        logger.info(`🚫 [BatchEntityResolver] Creation of ${field} declined`);
        return ActionResults.failure(declined.message, { field, error: declined.code });
      }
      case 'modify': {
        const replacement = await this.deps.extractor.extractItems(
          intent.instruction,
          BatchEntityResolver.itemFieldNames(config)
        );
        if (replacement.length === 0) {
          return this.confirmationPrompt(run, missing);
        }
        // The new list replaces the old one entirely
        context.clearField(field);
        logger.info(`✏️ [BatchEntityResolver] ${field} list replaced`, { items: replacement.length });
        return this.process(run, replacement);
      }
      default:
        return this.confirmationPrompt(run, missing);
    }
  }

  // ==========================================================================
  // CREATION
  // ==========================================================================

  private async nextCreation(run: BatchRun, validated: DataRecord[], missing: DataRecord[], index: number): Promise<ActionResult> {
    const { field, config, context } = run;
    if (missing.length === 0) {
      return this.finalize(run, validated, index);
    }

    if (!config.subflow) {
      return this.createDirectly(run, validated, missing, index);
    }

    const [item] = missing;
    const current = this.displayName(item, run);
    context.setBatchState(field, { kind: 'creating_via_subflow', validated, missing, index, current });

    const result = await this.deps.subflows.start(context, {
      field,
      config,
      identifier: current,
      mode: 'batch',
      item,
    });
    if (result.status === 'needs_user_input' && result.metadata.awaiting === 'retry') {
      context.setBatchState(field, { kind: 'awaiting_create_confirm', validated, missing });
    }
    return result;
  }

  private async createDirectly(run: BatchRun, validated: DataRecord[], missing: DataRecord[], index: number): Promise<ActionResult> {
    const { config, store } = run;
    let resolved = [...validated];
    let remaining = [...missing];
    let created = index;

    while (remaining.length > 0) {
      const [item] = remaining;
      const current = this.displayName(item, run);
      const record = await this.deps.lookup.createEntity(store, config, current, item);
      ({ resolved, remaining } = this.settle(run, resolved, remaining, current, record));
      created++;
    }

    return this.finalize(run, resolved, created);
  }

  /**
   * Move every missing item named `current` to validated, now backed by `record`
   */
  private settle(
    run: BatchRun,
    validated: DataRecord[],
    missing: DataRecord[],
    current: string,
    record: EntityRecord,
    entered: DataRecord = {}
  ): { resolved: DataRecord[]; remaining: DataRecord[] } {
    const resolved = [...validated];
    const remaining: DataRecord[] = [];
    for (const item of missing) {
      if (this.displayName(item, run) === current) {
        resolved.push(this.mergeValidated(run.config, record, item, entered));
      } else {
        remaining.push(item);
      }
    }
    return { resolved, remaining };
  }

  private async afterSubflow(run: BatchRun, completion: SubflowCompletion): Promise<ActionResult> {
    const { field, config, store, context } = run;
    const state = context.batchState(field);
    if (state.kind !== 'creating_via_subflow') {
      logger.warn(`⚠️ [BatchEntityResolver] Subflow finished for ${field} without a pending batch`);
      context.setBatchState(field, { kind: 'idle' });
      return ActionResults.needsUserInput(this.deps.prompts.buildRetryMessage(run.name), {
        field,
        awaiting: 'retry',
        error: 'unexpected',
      });
    }

    const { validated, missing, index, current } = state;
    if (completion.entityId === null) {
      context.setBatchState(field, { kind: 'awaiting_create_confirm', validated, missing });
      return ActionResults.needsUserInput(
        `I couldn't confirm the ${run.name.singular} '${current}' was saved. Would you like to try again?`,
        { field, awaiting: 'retry', error: 'unexpected', missingItems: this.missingLines(run, missing).map((line) => line.name) }
      );
    }

    const stored = await this.deps.lookup.findById(store, completion.entityId);
    const record: EntityRecord = stored ?? { id: completion.entityId, fields: {} };
    const entered = pickFields(completion.collected, [...config.requiredItemFields, ...config.includeFields]);
    const { resolved, remaining } = this.settle(run, validated, missing, current, record, entered);

    logger.info(`➡️ [BatchEntityResolver] ${field}: created '${current}', ${remaining.length} left`);
    return this.nextCreation(run, resolved, remaining, index + 1);
  }

  // ==========================================================================
  // FINALIZE
  // ==========================================================================

  private finalize(run: BatchRun, validated: DataRecord[], created: number): ActionResult {
    const { field, config, context } = run;

    context.setCollected(field, validated);
    for (const alias of config.aliasKeys) {
      if (alias !== field) context.removeCollected(alias);
    }
    context.setBatchState(field, { kind: 'done' });

    const noun = validated.length === 1 ? run.name.singular : run.name.plural;
    const message =
      created > 0
        ? `${validated.length} ${noun} ready (${created} created)`
        : `${validated.length} ${noun} found`;
    return ActionResults.success(message, { [field]: validated, created });
  }
}
