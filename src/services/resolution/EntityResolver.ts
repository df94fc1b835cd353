import { HumanInTheLoop } from '../../orchestration/HumanInTheLoop.js';
import { StateMachine } from '../../orchestration/StateMachine.js';
import type {
  ActionResult,
  Candidate,
  DataRecord,
  EntityRecord,
  FieldResolutionState,
  ResolutionConfig,
} from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { TextUtils } from '../../utils/text.js';
import type { WorkflowContext } from '../context/WorkflowContext.js';
import type { EntityStore, EntityStoreRegistry } from '../store/EntityStore.js';
import type { DuplicateRanker } from './DuplicateRanker.js';
import { EntityLookup } from './EntityLookup.js';
import { UserDeclinedError } from './errors.js';
import type { FriendlyName, FriendlyNames } from './FriendlyNames.js';
import type { IntentInterpreter } from './IntentInterpreter.js';
import { ActionResults } from './results.js';
import type { SubflowCompletion, SubflowOrchestrator } from './SubflowOrchestrator.js';

export interface EntityResolverDependencies {
  stores: EntityStoreRegistry;
  lookup: EntityLookup;
  ranker: DuplicateRanker;
  interpreter: IntentInterpreter;
  subflows: SubflowOrchestrator;
  names: FriendlyNames;
  prompts: HumanInTheLoop;
}

export type EntityIdentifier = string | DataRecord;

interface ResolutionRun {
  field: string;
  config: ResolutionConfig;
  store: EntityStore;
  name: FriendlyName;
  context: WorkflowContext;
  machine: StateMachine;
}

/**
 * Resolves one entity reference across as many turns as it takes.
 *
 * Each call resumes from the field's persisted state: a pending duplicate choice,
 * a pending creation confirmation, or a creation subflow that has just finished.
 */
export class EntityResolver {
  constructor(private readonly deps: EntityResolverDependencies) {}

  async resolve(
    field: string,
    config: ResolutionConfig,
    identifier: EntityIdentifier,
    context: WorkflowContext
  ): Promise<ActionResult> {
    const store = this.deps.stores.get(config.model);
    const name = this.deps.names.forField(field, config);
    const state = context.fieldState(field);

    if (this.deps.subflows.isRunning(context, field)) {
      return ActionResults.needsUserInput(`Let's finish creating the ${name.singular} first.`, {
        field,
        awaiting: 'subflow',
        subflow: config.subflow,
      });
    }

    const run: ResolutionRun = {
      field,
      config,
      store,
      name,
      context,
      machine: new StateMachine(StateMachine.entryPhase(state), `${field} resolution`),
    };

    const completion = this.deps.subflows.complete(context, field);
    if (completion) {
      run.machine = new StateMachine('creating_via_subflow', `${field} resolution`);
      return this.finishFromSubflow(run, completion, state);
    }

    switch (state.kind) {
      case 'awaiting_duplicate_choice':
        return this.handleDuplicateChoice(run, state.identifier, state.candidates);
      case 'awaiting_create_confirm':
        return this.continueCreation(run, state.identifier);
      case 'creating_via_subflow':
        // The subflow marker is gone without a completion; start over
        logger.warn(`⚠️ [EntityResolver] Lost subflow for ${field}, searching again`);
        context.setFieldState(field, { kind: 'idle' });
        run.machine = new StateMachine('searching', `${field} resolution`);
        break;
      default:
        break;
    }

    return this.search(run, this.captureIdentifier(field, config, identifier, context));
  }

  /**
   * Search value for the identifier. Structured identifiers are merged into the field's extracted data.
   */
  captureIdentifier(field: string, config: ResolutionConfig, identifier: EntityIdentifier, context: WorkflowContext): string {
    if (typeof identifier === 'string') {
      return identifier.trim();
    }

    context.mergeExtractedData(field, identifier);
    const preferred = EntityLookup.searchValueOf(identifier, config);
    if (preferred) return preferred;

    for (const value of Object.values(identifier)) {
      const text = TextUtils.asText(value);
      if (text) return text;
    }
    return '';
  }

  // ==========================================================================
  // SEARCH
  // ==========================================================================

  private async search(run: ResolutionRun, identifier: string): Promise<ActionResult> {
    const { field, config, store, machine, context } = run;

    if (!identifier) {
      machine.transition('failed');
      context.clearField(field);
      return ActionResults.failure('Cannot create entity - identifier is missing', { field, error: 'not_found' });
    }

    const checkDuplicates = config.checkDuplicates && config.askOnDuplicate;
    if (checkDuplicates) {
      machine.transition('duplicate_check');
    }

    const exact = await this.deps.lookup.exactMatch(store, config, identifier);
    if (exact) {
      machine.transition(checkDuplicates ? 'auto_resolved' : 'found');
      return this.succeed(run, exact, `Found ${run.name.singular} '${identifier}'`);
    }

    if (checkDuplicates) {
      const candidates = await this.deps.ranker.findSimilar(store, identifier, config);

      if (candidates.length > 0) {
        machine.transition('awaiting_choice');
        context.setFieldState(field, { kind: 'awaiting_duplicate_choice', identifier, candidates });
        logger.info(`🔍 [EntityResolver] ${candidates.length} possible duplicates for ${field}`, { identifier });
        return ActionResults.needsUserInput(
          this.deps.prompts.buildDuplicateChoiceMessage(run.name, candidates, config),
          {
            field,
            awaiting: 'duplicate_choice',
            error: 'ambiguous_match',
            candidates: HumanInTheLoop.summarize(candidates, config),
          }
        );
      }
    }

    machine.transition('not_found');
    return this.beginCreation(run, identifier);
  }

  // ==========================================================================
  // DUPLICATE CHOICE
  // ==========================================================================

  private async handleDuplicateChoice(run: ResolutionRun, identifier: string, candidates: Candidate[]): Promise<ActionResult> {
    const { field, config, context, machine } = run;
    const labels = candidates.map((candidate) => HumanInTheLoop.candidateLabel(candidate, config));
    const choice = await this.deps.interpreter.interpretDuplicateChoice(context.lastUserMessage(), labels);

    switch (choice.kind) {
      case 'use': {
        const candidate = candidates[choice.index];
        machine.transition('resolved');
        return this.succeed(run, { id: candidate.id, fields: candidate.fields }, `Using existing ${run.name.singular} '${labels[choice.index]}'`);
      }
      case 'create':
        machine.transition('creating_new');
        context.setFieldState(field, { kind: 'idle' });
        return this.create(run, identifier);
      default:
        machine.transition('awaiting_choice');
        return ActionResults.needsUserInput(
          this.deps.prompts.buildUnclearChoiceMessage(run.name, candidates, config),
          { field, awaiting: 'duplicate_choice', candidates: HumanInTheLoop.summarize(candidates, config) }
        );
    }
  }

  // ==========================================================================
  // CREATION
  // ==========================================================================

  private beginCreation(run: ResolutionRun, identifier: string): Promise<ActionResult> | ActionResult {
    const { field, config, context, machine } = run;

    if (config.confirmBeforeCreate || config.interactive) {
      machine.transition('awaiting_create_confirmation');
      context.setFieldState(field, { kind: 'awaiting_create_confirm', identifier });
      return ActionResults.needsUserInput(this.deps.prompts.buildCreateConfirmationMessage(run.name, identifier), {
        field,
        awaiting: 'create_confirmation',
        error: 'not_found',
      });
    }

    return this.create(run, identifier);
  }

  private async continueCreation(run: ResolutionRun, identifier: string): Promise<ActionResult> {
    const { field, context, machine } = run;
    const intent = await this.deps.interpreter.interpretConfirmation(context.lastUserMessage());

    switch (intent.kind) {
      case 'confirm':
        return this.create(run, identifier);
      case 'decline': {
        machine.transition('cancelled');
        context.clearField(field);
        const declined = new UserDeclinedError();
        logger.info(`🚫 [EntityResolver] Creation of ${field} declined`, { identifier });
        return ActionResults.failure(declined.message, { field, error: declined.code });
      }
      default:
        machine.transition('awaiting_create_confirmation');
        return ActionResults.needsUserInput(this.deps.prompts.buildCreateConfirmationMessage(run.name, identifier), {
          field,
          awaiting: 'create_confirmation',
        });
    }
  }

  private async create(run: ResolutionRun, identifier: string): Promise<ActionResult> {
    const { field, config, store, context, machine } = run;

    if (!identifier.trim()) {
      machine.transition('failed');
      context.clearField(field);
      return ActionResults.failure('Cannot create entity - identifier is missing', { field, error: 'not_found' });
    }

    if (config.subflow) {
      machine.transition('creating_via_subflow');
      context.setFieldState(field, { kind: 'creating_via_subflow', identifier });
      const result = await this.deps.subflows.start(context, {
        field,
        config,
        identifier,
        mode: 'single',
        extracted: context.extractedData(field),
      });
      if (result.status === 'needs_user_input' && result.metadata.awaiting === 'retry') {
        context.setFieldState(field, { kind: 'awaiting_create_confirm', identifier });
      }
      return result;
    }

    machine.transition('creating_auto');
    const record = await this.deps.lookup.createEntity(store, config, identifier, context.extractedData(field));
    machine.transition('resolved');
    return this.succeed(run, record, `Created ${run.name.singular} '${identifier}'`);
  }

  private async finishFromSubflow(
    run: ResolutionRun,
    completion: SubflowCompletion,
    state: FieldResolutionState
  ): Promise<ActionResult> {
    const { field, config, store, context, machine } = run;
    const identifier =
      state.kind === 'creating_via_subflow'
        ? state.identifier
        : TextUtils.asText(completion.collected.name) ?? '';

    if (completion.entityId === null) {
      machine.transition('failed');
      context.setFieldState(field, { kind: 'awaiting_create_confirm', identifier });
      return ActionResults.needsUserInput(
        `I couldn't confirm the new ${run.name.singular} was saved. Would you like to try again?`,
        { field, awaiting: 'retry', error: 'unexpected' }
      );
    }

    const stored = await this.deps.lookup.findById(store, completion.entityId);
    const userEntered = pickFields(completion.collected, [...config.requiredItemFields, ...config.includeFields]);
    const record: EntityRecord = {
      id: completion.entityId,
      fields: { ...(stored?.fields ?? {}), ...userEntered },
    };

    machine.transition('resolved');
    return this.succeed(run, record, `Created ${run.name.singular} '${identifier}'`);
  }

  // ==========================================================================
  // COMPLETION
  // ==========================================================================

  /**
   * Record the resolved id and project included fields into collectedData without overwriting user values.
   */
  private succeed(run: ResolutionRun, record: EntityRecord, message: string): ActionResult {
    const { field, config, context } = run;

    context.setFieldState(field, { kind: 'done', entityId: record.id });
    context.setCollected(field, record.id);

    for (const [key, value] of Object.entries(EntityLookup.project(record, config.includeFields))) {
      if (context.getCollected(key) === undefined) {
        context.setCollected(key, value);
      }
    }

    logger.info(`✅ [EntityResolver] Resolved ${field}`, {
      id: record.id,
      path: run.machine.getStateHistory().join(' -> '),
    });

    return ActionResults.success(message, { [field]: record.id, entity: { ...record.fields, id: record.id } });
  }
}

export function pickFields(data: DataRecord, fields: readonly string[]): DataRecord {
  const picked: DataRecord = {};
  for (const field of fields) {
    const value = data[field];
    if (value !== undefined && value !== null && value !== '') picked[field] = value;
  }
  return picked;
}
