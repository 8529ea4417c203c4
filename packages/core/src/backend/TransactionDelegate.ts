import { SessionStoreError } from "../errors";
import type { TransactionControl } from "./StorageBackend";

/**
 * Connection surface needed to drive a transaction. `mysql2/promise` connections
 * satisfy it directly; other drivers are wrapped by their backend.
 */
export interface TransactionalConnection {
  beginTransaction(): Promise<unknown>;
  commit(): Promise<unknown>;
  rollback(): Promise<unknown>;
}

export type TransactionPhase = "begin" | "commit" | "rollback";

export type TransactionErrorMapper = (error: unknown, phase: TransactionPhase) => SessionStoreError;

/**
 * Forwards transaction control to the backend's connection and tracks whether a
 * transaction is open. Backends hold one of these instead of inheriting the behavior.
 */
export class TransactionDelegate implements TransactionControl {
  private active = false;

  constructor(
    private readonly resolveConnection: () => Promise<TransactionalConnection>,
    private readonly mapError: TransactionErrorMapper = defaultTransactionError,
  ) {}

  async beginTransaction(): Promise<boolean> {
    if (this.active) {
      return false;
    }

    const connection = await this.resolveConnection();
    try {
      await connection.beginTransaction();
    } catch (error) {
      throw this.mapError(error, "begin");
    }
    this.active = true;
    return true;
  }

  async commit(): Promise<boolean> {
    if (!this.active) {
      return false;
    }

    const connection = await this.resolveConnection();
    try {
      await connection.commit();
      return true;
    } catch (error) {
      throw this.mapError(error, "commit");
    } finally {
      this.active = false;
    }
  }

  async rollback(): Promise<boolean> {
    if (!this.active) {
      return false;
    }

    const connection = await this.resolveConnection();
    try {
      await connection.rollback();
      return true;
    } catch (error) {
      throw this.mapError(error, "rollback");
    } finally {
      this.active = false;
    }
  }

  inTransaction(): boolean {
    return this.active;
  }
}

function defaultTransactionError(error: unknown, phase: TransactionPhase): SessionStoreError {
  return new SessionStoreError("BACKEND_FAILURE", `Transaction ${phase} failed.`, error, { phase });
}
