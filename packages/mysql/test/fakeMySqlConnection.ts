import type { MySqlConnectionLike } from "../src";

export type FakeRow = {
  session_data: string;
  last_activity: string;
};

export type ExecutedStatement = {
  sql: string;
  values: unknown[];
};

/**
 * In-process stand-in for a `mysql2/promise` connection that understands the
 * handful of statements the session backend sends.
 */
export class FakeMySqlConnection implements MySqlConnectionLike {
  readonly rows = new Map<string, FakeRow>();
  readonly statements: ExecutedStatement[] = [];
  readonly events: string[] = [];
  private nextFailure: unknown = null;

  failNextWith(error: unknown): void {
    this.nextFailure = error;
  }

  async execute(sql: string, values: unknown[] = []): Promise<[unknown, unknown]> {
    this.statements.push({ sql, values });
    this.throwPendingFailure();

    if (sql.startsWith("SELECT session_data")) {
      const [id, threshold] = values.map(String);
      const row = id === undefined ? undefined : this.rows.get(id);
      if (!row || threshold === undefined || row.last_activity < threshold) {
        return [[], []];
      }
      return [[{ session_data: row.session_data }], []];
    }

    if (sql.startsWith("REPLACE INTO")) {
      const [id, data, lastActivity] = values.map(String);
      if (id !== undefined && data !== undefined && lastActivity !== undefined) {
        this.rows.set(id, { session_data: data, last_activity: lastActivity });
      }
      return [{ affectedRows: 1 }, undefined];
    }

    if (sql.includes("WHERE id = ?")) {
      const removed = this.rows.delete(String(values[0]));
      return [{ affectedRows: removed ? 1 : 0 }, undefined];
    }

    if (sql.includes("WHERE last_activity < ?")) {
      const threshold = String(values[0]);
      let affectedRows = 0;
      for (const [id, row] of this.rows) {
        if (row.last_activity < threshold) {
          this.rows.delete(id);
          affectedRows += 1;
        }
      }
      return [{ affectedRows }, undefined];
    }

    throw new Error(`Unsupported statement: ${sql}`);
  }

  async beginTransaction(): Promise<void> {
    this.events.push("begin");
    this.throwPendingFailure();
  }

  async commit(): Promise<void> {
    this.events.push("commit");
    this.throwPendingFailure();
  }

  async rollback(): Promise<void> {
    this.events.push("rollback");
  }

  async end(): Promise<void> {
    this.events.push("end");
  }

  private throwPendingFailure(): void {
    if (this.nextFailure !== null) {
      const failure = this.nextFailure;
      this.nextFailure = null;
      throw failure;
    }
  }
}

export function driverError(code: string, message: string): Error & { code: string } {
  return Object.assign(new Error(message), { code });
}
