import type { ActionResult } from '../types/index.js';
import { errorMeta, logger } from '../utils/logger.js';
import type { RunExclusiveResult, SessionLock } from '../services/concurrency/SessionLock.js';
import type { SessionStore } from '../services/context/SessionStore.js';
import { WorkflowContext, type WorkflowContextOptions } from '../services/context/WorkflowContext.js';
import { ActionResults } from '../services/resolution/results.js';
import type { WorkflowRunner } from './WorkflowEngine.js';

export interface TurnOptions {
  /** Workflow to start when the session has none in progress. */
  workflowId?: string;
}

/**
 * One user message in, one reply out, with the session's context loaded before
 * and saved after. A turn that throws is not saved, so the stored context stays
 * at its pre-turn state.
 */
export class ConversationTurnRunner {
  constructor(
    private readonly sessions: SessionStore,
    private readonly runner: WorkflowRunner,
    private readonly lock: SessionLock,
    private readonly contextOptions: WorkflowContextOptions = {}
  ) {}

  async handleTurn(sessionId: string, message: string, options: TurnOptions = {}): Promise<RunExclusiveResult<ActionResult>> {
    const outcome = await this.lock.runExclusive(sessionId, async () => {
      try {
        return await this.runTurn(sessionId, message, options);
      } catch (error) {
        logger.error(`❌ [ConversationTurnRunner] Turn failed for session ${sessionId}`, errorMeta(error));
        return ActionResults.failureFromError(error);
      }
    });

    if (outcome.status === 'rejected') {
      logger.warn(`⏳ [ConversationTurnRunner] Session ${sessionId} is busy, turn rejected`);
    }
    return outcome;
  }

  private async runTurn(sessionId: string, message: string, options: TurnOptions): Promise<ActionResult> {
    const context = (await this.sessions.load(sessionId)) ?? WorkflowContext.create(sessionId, this.contextOptions);

    let result: ActionResult;
    if (context.currentWorkflow) {
      result = await this.runner.runTurn(context, message);
    } else if (options.workflowId) {
      result = await this.runner.start(context, options.workflowId, message);
    } else {
      return ActionResults.failure('No active workflow');
    }

    context.touch();
    await this.sessions.save(sessionId, context);
    return result;
  }
}
