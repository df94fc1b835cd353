import type { ActionResult, ResolutionConfig } from '../../types/index.js';
import { errorMeta, logger } from '../../utils/logger.js';
import type { WorkflowContext } from '../context/WorkflowContext.js';
import type { BatchEntityResolver, BatchItems } from './BatchEntityResolver.js';
import type { EntityIdentifier, EntityResolver } from './EntityResolver.js';
import { ConfigurationError, isResolutionError } from './errors.js';
import type { FriendlyNames } from './FriendlyNames.js';
import { ActionResults } from './results.js';

/**
 * Entry points for the host conversation layer.
 *
 * A call either returns a result or leaves the context exactly as it found it:
 * any thrown error restores the snapshot taken on entry. Configuration errors
 * fail the call; anything else asks the user whether to try again.
 */
export class ResolutionEngine {
  constructor(
    private readonly single: EntityResolver,
    private readonly batch: BatchEntityResolver,
    private readonly names: FriendlyNames
  ) {}

  async resolve(
    field: string,
    config: ResolutionConfig,
    identifier: EntityIdentifier,
    context: WorkflowContext
  ): Promise<ActionResult> {
    return this.guard(field, config, context, () => this.single.resolve(field, config, identifier, context));
  }

  async resolveBatch(
    field: string,
    config: ResolutionConfig,
    items: BatchItems,
    context: WorkflowContext
  ): Promise<ActionResult> {
    return this.guard(field, config, context, () => this.batch.resolveBatch(field, config, items, context));
  }

  private async guard(
    field: string,
    config: ResolutionConfig,
    context: WorkflowContext,
    operation: () => Promise<ActionResult>
  ): Promise<ActionResult> {
    const snapshot = context.snapshot();
    try {
      const result = await operation();
      context.touch();
      return result;
    } catch (error) {
      context.restore(snapshot);

      if (error instanceof ConfigurationError) {
        logger.error(`❌ [ResolutionEngine] Configuration error resolving ${field}`, errorMeta(error));
        return ActionResults.failureFromError(error, field);
      }

      logger.error(`❌ [ResolutionEngine] Error resolving ${field}`, { sessionId: context.sessionId, ...errorMeta(error) });
      const name = this.names.forField(field, config);
      return ActionResults.needsUserInput(
        `Something went wrong while resolving the ${name.singular}. Would you like to try again?`,
        { field, awaiting: 'retry', error: isResolutionError(error) ? error.code : 'unexpected' }
      );
    }
  }
}
