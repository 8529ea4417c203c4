import {
  MIN_SESSION_ID_LENGTH,
  SessionStoreError,
  TransactionDelegate,
  configurationError,
  expiryThresholdMs,
  normalizeLifetime,
  systemClock,
  type Clock,
  type Logger,
  type StorageBackend,
} from "@rowsession/core";
import {
  MySqlConnectionManager,
  type MySqlConnectionInput,
  type MySqlConnectionLike,
  type MySqlConnectionParams,
  type MySqlConnectionWrapper,
} from "./internal/mysqlConnection";
import { toMySqlError, type MySqlOperation } from "./internal/mysqlErrors";

/**
 * Configuration for {@link MySqlSessionBackend}.
 */
export type MySqlSessionBackendOptions = {
  lockingEnabled?: boolean;
  sessionIdLength?: number;
  tableName?: string;
  clock?: Clock;
  logger?: Logger;
};

const DEFAULT_TABLE_NAME = "sessions";
const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_$]*$/;

/**
 * Session rows in a MySQL (InnoDB) table. With locking enabled the read takes
 * `SELECT ... FOR UPDATE`, so a second request for the same id waits on the row
 * until the first one commits.
 */
export class MySqlSessionBackend implements StorageBackend {
  private readonly connectionManager: MySqlConnectionManager;
  private readonly transactions: TransactionDelegate;
  private readonly lockingEnabled: boolean;
  private readonly idLength: number;
  private readonly table: string;
  private readonly clock: Clock;
  private readonly logger?: Logger;
  private hits = 0;

  constructor(connection: MySqlConnectionInput, options?: MySqlSessionBackendOptions) {
    this.idLength = options?.sessionIdLength ?? MIN_SESSION_ID_LENGTH;
    if (this.idLength < MIN_SESSION_ID_LENGTH) {
      throw configurationError(`Session ID length cannot be less than ${MIN_SESSION_ID_LENGTH}.`, {
        sessionIdLength: this.idLength,
      });
    }

    this.table = quoteTableName(options?.tableName ?? DEFAULT_TABLE_NAME);
    this.lockingEnabled = options?.lockingEnabled ?? true;
    this.clock = options?.clock ?? systemClock;
    this.logger = options?.logger;
    this.connectionManager = new MySqlConnectionManager(connection);
    this.transactions = new TransactionDelegate(
      () => this.connect(),
      (error, phase) => toMySqlError(error, phase),
    );
  }

  /** Number of statements sent to the server by this backend. */
  get hitCount(): number {
    return this.hits;
  }

  async select(sessionId: string, maxLifetimeSeconds: number): Promise<string | null> {
    const threshold = toDateTime(expiryThresholdMs(this.clock, normalizeLifetime(maxLifetimeSeconds)));
    const sql =
      `SELECT session_data FROM ${this.table} WHERE id = ? AND last_activity >= ?` +
      (this.lockingEnabled ? " FOR UPDATE" : "");

    const rows = await this.execute("select", sql, [sessionId, threshold]);
    return readSessionData(rows);
  }

  async save(sessionId: string, data: string): Promise<boolean> {
    await this.execute(
      "save",
      `REPLACE INTO ${this.table} (id, session_data, last_activity) VALUES (?, ?, ?)`,
      [sessionId, data, toDateTime(this.clock())],
    );
    return true;
  }

  async delete(sessionId: string): Promise<boolean> {
    await this.execute("delete", `DELETE FROM ${this.table} WHERE id = ?`, [sessionId]);
    return true;
  }

  async gc(maxLifetimeSeconds: number): Promise<boolean> {
    const threshold = toDateTime(expiryThresholdMs(this.clock, normalizeLifetime(maxLifetimeSeconds)));
    const result = await this.execute("gc", `DELETE FROM ${this.table} WHERE last_activity < ?`, [threshold]);

    this.logger?.debug("Expired sessions collected.", {
      affectedRows: readAffectedRows(result),
      threshold,
    });
    return true;
  }

  beginTransaction(): Promise<boolean> {
    return this.transactions.beginTransaction();
  }

  commit(): Promise<boolean> {
    return this.transactions.commit();
  }

  rollback(): Promise<boolean> {
    return this.transactions.rollback();
  }

  inTransaction(): boolean {
    return this.transactions.inTransaction();
  }

  isLockingEnabled(): boolean {
    return this.lockingEnabled;
  }

  sessionIdLength(): number {
    return this.idLength;
  }

  async release(): Promise<void> {
    try {
      await this.connectionManager.close();
    } catch (error) {
      throw toMySqlError(error, "connect");
    }
  }

  private async connect(): Promise<MySqlConnectionLike> {
    try {
      return await this.connectionManager.getConnection();
    } catch (error) {
      throw toMySqlError(error, "connect");
    }
  }

  private async execute(operation: MySqlOperation, sql: string, values: unknown[]): Promise<unknown> {
    const connection = await this.connect();
    this.hits += 1;
    try {
      const [result] = await connection.execute(sql, values);
      return result;
    } catch (error) {
      throw toMySqlError(error, operation);
    }
  }
}

/**
 * DDL for the sessions table.
 */
export function createTableSql(tableName = DEFAULT_TABLE_NAME, sessionIdLength = MIN_SESSION_ID_LENGTH): string {
  const table = quoteTableName(tableName);
  return [
    `CREATE TABLE IF NOT EXISTS ${table} (`,
    `  \`id\` VARCHAR(${sessionIdLength}) NOT NULL,`,
    "  `session_data` MEDIUMTEXT NOT NULL,",
    "  `last_activity` DATETIME NOT NULL,",
    "  PRIMARY KEY (`id`),",
    "  KEY `last_activity_idx` (`last_activity`)",
    ") ENGINE=InnoDB",
  ].join("\n");
}

/**
 * Formats epoch milliseconds as a UTC `DATETIME` literal.
 */
export function toDateTime(epochMs: number): string {
  return new Date(epochMs).toISOString().slice(0, 19).replace("T", " ");
}

function quoteTableName(tableName: string): string {
  if (!tableName) {
    throw configurationError("Table name cannot be empty.");
  }
  if (!TABLE_NAME_PATTERN.test(tableName)) {
    throw configurationError(`Invalid table name: ${tableName}`, { tableName });
  }
  return `\`${tableName}\``;
}

function readSessionData(rows: unknown): string | null {
  if (!Array.isArray(rows) || rows.length === 0) {
    return null;
  }

  const row: unknown = rows[0];
  if (typeof row !== "object" || row === null || !("session_data" in row)) {
    throw new SessionStoreError("BACKEND_FAILURE", "Unexpected session row shape.");
  }

  const data = row.session_data;
  if (typeof data === "string") {
    return data;
  }
  if (Buffer.isBuffer(data)) {
    return data.toString("utf8");
  }
  if (data === null) {
    return "";
  }
  throw new SessionStoreError("BACKEND_FAILURE", "Unexpected session_data type.", undefined, {
    type: typeof data,
  });
}

function readAffectedRows(result: unknown): number | undefined {
  if (typeof result === "object" && result !== null && "affectedRows" in result) {
    return typeof result.affectedRows === "number" ? result.affectedRows : undefined;
  }
  return undefined;
}

export type { MySqlConnectionInput, MySqlConnectionLike, MySqlConnectionParams, MySqlConnectionWrapper };
