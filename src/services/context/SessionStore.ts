import { z } from 'zod';
import { query as defaultQuery, type QueryFn } from '../../config/database.js';
import { CONTEXT_LIMITS } from '../../config/resolution.js';
import { logger } from '../../utils/logger.js';
import { ProviderError } from '../resolution/errors.js';
import { WorkflowContext, type WorkflowContextOptions } from './WorkflowContext.js';

/**
 * Durable home of a session's WorkflowContext between turns.
 * Callers load before a turn and save after it; nothing else writes.
 */
export interface SessionStore {
  load(sessionId: string): Promise<WorkflowContext | null>;
  save(sessionId: string, context: WorkflowContext): Promise<void>;
  delete(sessionId: string): Promise<void>;
}

interface StoredSession {
  data: string;
  expiresAt: number;
}

/**
 * Keeps serialized contexts in memory so every load yields an independent copy.
 */
export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, StoredSession>();

  constructor(
    private readonly ttlMs: number = CONTEXT_LIMITS.DEFAULT_SESSION_TTL_MS,
    private readonly options: WorkflowContextOptions = {},
    private readonly now: () => number = Date.now
  ) {}

  async load(sessionId: string): Promise<WorkflowContext | null> {
    const stored = this.sessions.get(sessionId);
    if (!stored) return null;

    if (stored.expiresAt <= this.now()) {
      this.sessions.delete(sessionId);
      logger.debug(`🧹 [InMemorySessionStore] Session ${sessionId} expired`);
      return null;
    }
    return WorkflowContext.fromJSON(JSON.parse(stored.data), this.options);
  }

  async save(sessionId: string, context: WorkflowContext): Promise<void> {
    this.sessions.set(sessionId, {
      data: JSON.stringify(context.toJSON()),
      expiresAt: this.now() + this.ttlMs,
    });
  }

  async delete(sessionId: string): Promise<void> {
    this.sessions.delete(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }
}

const SessionRowSchema = z.object({ context: z.unknown() });

/**
 * One jsonb row per session in `workflow_sessions`; expired rows read as absent.
 */
export class PgSessionStore implements SessionStore {
  constructor(
    private readonly run: QueryFn = defaultQuery,
    private readonly ttlMs: number = CONTEXT_LIMITS.DEFAULT_SESSION_TTL_MS,
    private readonly options: WorkflowContextOptions = {}
  ) {}

  async load(sessionId: string): Promise<WorkflowContext | null> {
    const result = await this.execute(
      'SELECT context FROM workflow_sessions WHERE session_id = $1 AND expires_at > NOW()',
      [sessionId]
    );
    if (result.rows.length === 0) return null;

    const row = SessionRowSchema.parse(result.rows[0]);
    return WorkflowContext.fromJSON(row.context, this.options);
  }

  async save(sessionId: string, context: WorkflowContext): Promise<void> {
    await this.execute(
      `INSERT INTO workflow_sessions (session_id, context, expires_at, updated_at)
       VALUES ($1, $2::jsonb, NOW() + ($3 || ' milliseconds')::interval, NOW())
       ON CONFLICT (session_id)
       DO UPDATE SET context = EXCLUDED.context, expires_at = EXCLUDED.expires_at, updated_at = NOW()`,
      [sessionId, JSON.stringify(context.toJSON()), String(this.ttlMs)]
    );
  }

  async delete(sessionId: string): Promise<void> {
    await this.execute('DELETE FROM workflow_sessions WHERE session_id = $1', [sessionId]);
  }

  private async execute(text: string, params: unknown[]) {
    try {
      return await this.run(text, params);
    } catch (error) {
      throw new ProviderError('postgres', error instanceof Error ? error.message : String(error), { cause: error });
    }
  }
}
