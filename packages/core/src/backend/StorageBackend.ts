/**
 * Smallest identifier length a backend may be configured with.
 */
export const MIN_SESSION_ID_LENGTH = 256;

/**
 * Transaction control used to bracket a locking {@link StorageBackend.select}.
 */
export interface TransactionControl {
  beginTransaction(): Promise<boolean>;
  commit(): Promise<boolean>;
  inTransaction(): boolean;
}

/**
 * Persistence contract for session rows.
 *
 * `select` returns `null` for a missing or expired row; driver failures are thrown as
 * `SessionStoreError`, never folded into the empty result.
 */
export interface StorageBackend extends TransactionControl {
  /**
   * Loads the payload of a non-expired row. When locking is enabled the row stays
   * exclusively locked until the enclosing transaction commits, so the caller must
   * have begun one.
   */
  select(sessionId: string, maxLifetimeSeconds: number): Promise<string | null>;
  /** Inserts or overwrites the row and stamps `last_activity` with the current time. */
  save(sessionId: string, data: string): Promise<boolean>;
  delete(sessionId: string): Promise<boolean>;
  /** Removes every row whose `last_activity` is older than `maxLifetimeSeconds` ago. */
  gc(maxLifetimeSeconds: number): Promise<boolean>;
  /** Discards the active transaction, releasing its locks without keeping its writes. */
  rollback(): Promise<boolean>;
  isLockingEnabled(): boolean;
  sessionIdLength(): number;
  /** Gives back any connection the backend opened itself. */
  release?(): Promise<void>;
}
