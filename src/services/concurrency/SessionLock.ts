/**
 * Per-session turn lock: only one in-flight turn per session at a time.
 * A second turn for a busy session is rejected immediately; other sessions are not blocked.
 */

export type RunExclusiveResult<T> =
  | { status: 'accepted'; result: T }
  | { status: 'rejected'; reason: 'busy' };

export class SessionLock {
  private readonly busySessions = new Set<string>();

  /**
   * Run `fn` unless the session already has a turn in progress.
   * The lock is released in finally, including when `fn` throws.
   */
  async runExclusive<T>(sessionId: string, fn: () => Promise<T>): Promise<RunExclusiveResult<T>> {
    if (this.busySessions.has(sessionId)) {
      return { status: 'rejected', reason: 'busy' };
    }
    this.busySessions.add(sessionId);
    try {
      const result = await fn();
      return { status: 'accepted', result };
    } finally {
      this.busySessions.delete(sessionId);
    }
  }

  isBusy(sessionId: string): boolean {
    return this.busySessions.has(sessionId);
  }
}
