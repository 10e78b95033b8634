/**
 * Live session bookkeeping for graceful shutdown
 */

export interface SessionEntry {
  readonly id: number;
  readonly remote: string;
  readonly startedAt: number;
  /** Ends the session from the server side */
  readonly terminate: () => void;
}

export class SessionRegistry {
  private readonly sessions = new Map<number, SessionEntry>();
  private nextId = 1;
  private emptyWaiters: (() => void)[] = [];

  get size(): number {
    return this.sessions.size;
  }

  open(remote: string, terminate: () => void, startedAt: number = Date.now()): SessionEntry {
    const entry: SessionEntry = { id: this.nextId++, remote, startedAt, terminate };
    this.sessions.set(entry.id, entry);
    return entry;
  }

  /**
   * Forget a session. Returns the entry the first time, undefined after.
   */
  close(id: number): SessionEntry | undefined {
    const entry = this.sessions.get(id);
    if (!entry) return undefined;
    this.sessions.delete(id);
    if (this.sessions.size === 0) this.notifyEmpty();
    return entry;
  }

  list(): SessionEntry[] {
    return [...this.sessions.values()];
  }

  whenEmpty(): Promise<void> {
    if (this.sessions.size === 0) return Promise.resolve();
    return new Promise(resolve => this.emptyWaiters.push(resolve));
  }

  /**
   * Wait up to `timeout` ms for every session to close, then terminate
   * whatever is left. Resolves with the number of sessions terminated.
   */
  async drain(timeout: number): Promise<number> {
    if (this.sessions.size === 0) return 0;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = await Promise.race([
      this.whenEmpty().then(() => false),
      new Promise<boolean>(resolve => {
        timer = setTimeout(() => resolve(true), timeout);
      }),
    ]);
    clearTimeout(timer);
    if (!timedOut) return 0;

    const remaining = this.list();
    for (const entry of remaining) {
      entry.terminate();
      this.close(entry.id);
    }
    return remaining.length;
  }

  private notifyEmpty(): void {
    const waiters = this.emptyWaiters;
    this.emptyWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
