import { configurationError } from "../errors";
import { expiryThresholdMs, normalizeLifetime, systemClock, type Clock } from "../utils/time";
import { MIN_SESSION_ID_LENGTH, type StorageBackend } from "./StorageBackend";

export type MemorySessionRow = {
  data: string;
  lastActivity: number;
};

type RowLock = {
  owner: symbol;
  released: Promise<void>;
  release: () => void;
};

/**
 * In-process stand-in for the sessions table. Several {@link MemorySessionBackend}
 * instances may share one table, each acting as its own connection.
 */
export class MemorySessionTable {
  private readonly rows = new Map<string, MemorySessionRow>();
  private readonly locks = new Map<string, RowLock>();

  constructor(readonly clock: Clock = systemClock) {}

  get(sessionId: string): MemorySessionRow | undefined {
    return this.rows.get(sessionId);
  }

  put(sessionId: string, row: MemorySessionRow): void {
    this.rows.set(sessionId, row);
  }

  remove(sessionId: string): void {
    this.rows.delete(sessionId);
  }

  ids(): string[] {
    return [...this.rows.keys()];
  }

  get size(): number {
    return this.rows.size;
  }

  isLocked(sessionId: string): boolean {
    return this.locks.has(sessionId);
  }

  /**
   * Takes the exclusive lock on `sessionId` for `owner`, waiting for any other
   * owner to release it first. Re-entrant for the same owner.
   */
  async acquire(sessionId: string, owner: symbol): Promise<void> {
    for (;;) {
      const held = this.locks.get(sessionId);
      if (!held) {
        let release: () => void = () => undefined;
        const released = new Promise<void>((resolve) => {
          release = resolve;
        });
        this.locks.set(sessionId, { owner, released, release });
        return;
      }
      if (held.owner === owner) {
        return;
      }
      await held.released;
    }
  }

  /** Waits until no other owner holds the lock on `sessionId`. */
  async waitUnlocked(sessionId: string, owner?: symbol): Promise<void> {
    for (;;) {
      const held = this.locks.get(sessionId);
      if (!held || held.owner === owner) {
        return;
      }
      await held.released;
    }
  }

  releaseAll(owner: symbol): void {
    for (const [sessionId, lock] of this.locks.entries()) {
      if (lock.owner === owner) {
        this.locks.delete(sessionId);
        lock.release();
      }
    }
  }
}

export type MemorySessionBackendOptions = {
  lockingEnabled?: boolean; // default true
  sessionIdLength?: number; // default 256
};

type MemoryTransaction = {
  owner: symbol;
  undo: Map<string, MemorySessionRow | undefined>;
};

/**
 * Storage backend over a {@link MemorySessionTable}, with row locks that behave like
 * `SELECT ... FOR UPDATE` inside a transaction.
 */
export class MemorySessionBackend implements StorageBackend {
  /** Number of data operations sent to the table. */
  hitCount = 0;

  private readonly lockingEnabled: boolean;
  private readonly idLength: number;
  private transaction: MemoryTransaction | null = null;

  constructor(
    private readonly table: MemorySessionTable = new MemorySessionTable(),
    options?: MemorySessionBackendOptions,
  ) {
    this.lockingEnabled = options?.lockingEnabled ?? true;
    this.idLength = options?.sessionIdLength ?? MIN_SESSION_ID_LENGTH;

    if (this.idLength < MIN_SESSION_ID_LENGTH) {
      throw configurationError(`Session ID length cannot be less than ${MIN_SESSION_ID_LENGTH}.`, {
        sessionIdLength: this.idLength,
      });
    }
  }

  async select(sessionId: string, maxLifetimeSeconds: number): Promise<string | null> {
    const threshold = expiryThresholdMs(this.table.clock, normalizeLifetime(maxLifetimeSeconds));
    this.hitCount++;

    if (this.lockingEnabled && this.transaction) {
      await this.table.acquire(sessionId, this.transaction.owner);
    }

    const row = this.table.get(sessionId);
    if (!row || row.lastActivity < threshold) {
      return null;
    }
    return row.data;
  }

  async save(sessionId: string, data: string): Promise<boolean> {
    this.hitCount++;
    await this.lockForWrite(sessionId);
    this.table.put(sessionId, { data, lastActivity: this.table.clock() });
    return true;
  }

  async delete(sessionId: string): Promise<boolean> {
    this.hitCount++;
    await this.lockForWrite(sessionId);
    this.table.remove(sessionId);
    return true;
  }

  async gc(maxLifetimeSeconds: number): Promise<boolean> {
    const threshold = expiryThresholdMs(this.table.clock, normalizeLifetime(maxLifetimeSeconds));
    this.hitCount++;

    for (const sessionId of this.table.ids()) {
      const row = this.table.get(sessionId);
      if (!row || row.lastActivity >= threshold) {
        continue;
      }
      await this.lockForWrite(sessionId);
      const current = this.table.get(sessionId);
      if (current && current.lastActivity < threshold) {
        this.table.remove(sessionId);
      }
    }
    return true;
  }

  async beginTransaction(): Promise<boolean> {
    if (this.transaction) {
      return false;
    }
    this.transaction = { owner: Symbol("memory-transaction"), undo: new Map() };
    return true;
  }

  async commit(): Promise<boolean> {
    const transaction = this.transaction;
    if (!transaction) {
      return false;
    }
    this.transaction = null;
    this.table.releaseAll(transaction.owner);
    return true;
  }

  async rollback(): Promise<boolean> {
    const transaction = this.transaction;
    if (!transaction) {
      return false;
    }
    this.transaction = null;

    for (const [sessionId, previous] of transaction.undo.entries()) {
      if (previous) {
        this.table.put(sessionId, previous);
      } else {
        this.table.remove(sessionId);
      }
    }
    this.table.releaseAll(transaction.owner);
    return true;
  }

  inTransaction(): boolean {
    return this.transaction !== null;
  }

  isLockingEnabled(): boolean {
    return this.lockingEnabled;
  }

  sessionIdLength(): number {
    return this.idLength;
  }

  private async lockForWrite(sessionId: string): Promise<void> {
    const transaction = this.transaction;
    if (!transaction) {
      await this.table.waitUnlocked(sessionId);
      return;
    }

    await this.table.acquire(sessionId, transaction.owner);
    if (!transaction.undo.has(sessionId)) {
      transaction.undo.set(sessionId, this.table.get(sessionId));
    }
  }
}
