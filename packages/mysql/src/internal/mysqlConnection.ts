import type { ConnectionOptions } from "mysql2/promise";

/**
 * Subset of a `mysql2/promise` connection used by the session backend.
 */
export interface MySqlConnectionLike {
  execute(sql: string, values?: unknown[]): Promise<[unknown, unknown]>;
  beginTransaction(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  end?(): Promise<void>;
}

export type MySqlConnectionParams = {
  uri?: string;
  host?: string;
  port?: number;
  user?: string;
  password?: string;
  database?: string;
  connectionOptions?: ConnectionOptions;
};

export type MySqlConnectionWrapper = {
  connection: MySqlConnectionLike;
  manageConnection?: boolean;
};

export type MySqlConnectionInput = MySqlConnectionLike | MySqlConnectionWrapper | MySqlConnectionParams;

/**
 * Owns the backend's single connection. Params-based input connects lazily on
 * first use; a supplied connection is used as-is and only ended when
 * `manageConnection` is set.
 */
export class MySqlConnectionManager {
  private readonly ownConnection: boolean;
  private readonly connectsLazily: boolean;
  private readonly connectionInput: MySqlConnectionInput;
  private connection: MySqlConnectionLike | null = null;
  private connectionInitPromise: Promise<MySqlConnectionLike> | null = null;

  constructor(connection: MySqlConnectionInput) {
    this.connectionInput = connection;

    if (isMySqlConnectionLike(connection)) {
      this.ownConnection = false;
      this.connectsLazily = false;
      this.connection = connection;
      return;
    }

    if (isConnectionWrapper(connection)) {
      this.ownConnection = connection.manageConnection ?? false;
      this.connectsLazily = false;
      this.connection = connection.connection;
      return;
    }

    this.ownConnection = true;
    this.connectsLazily = true;
  }

  get ownsConnection(): boolean {
    return this.ownConnection;
  }

  async getConnection(): Promise<MySqlConnectionLike> {
    if (this.connection) {
      return this.connection;
    }

    if (!this.connectionInitPromise) {
      this.connectionInitPromise = this.createOwnedConnection();
    }

    try {
      this.connection = await this.connectionInitPromise;
    } catch (error) {
      this.connectionInitPromise = null;
      throw error;
    }
    return this.connection;
  }

  async close(): Promise<void> {
    if (!this.ownConnection || !this.connection) {
      return;
    }

    const connection = this.connection;
    if (this.connectsLazily) {
      this.connection = null;
      this.connectionInitPromise = null;
    }

    if (typeof connection.end === "function") {
      await connection.end();
    }
  }

  private async createOwnedConnection(): Promise<MySqlConnectionLike> {
    const connection = this.connectionInput;
    if (isMySqlConnectionLike(connection)) {
      return connection;
    }

    if (isConnectionWrapper(connection)) {
      return connection.connection;
    }

    const mysql = await import("mysql2/promise");
    return mysql.createConnection(buildConnectionOptions(connection));
  }
}

export function isMySqlConnectionLike(value: unknown): value is MySqlConnectionLike {
  if (!value || typeof value !== "object") {
    return false;
  }

  return (
    "execute" in value &&
    typeof value.execute === "function" &&
    "beginTransaction" in value &&
    typeof value.beginTransaction === "function" &&
    "commit" in value &&
    typeof value.commit === "function"
  );
}

export function isConnectionWrapper(value: unknown): value is MySqlConnectionWrapper {
  if (!value || typeof value !== "object" || !("connection" in value)) {
    return false;
  }

  return isMySqlConnectionLike(value.connection);
}

function buildConnectionOptions(connection: MySqlConnectionParams): ConnectionOptions {
  const options: ConnectionOptions = {
    ...(connection.connectionOptions ?? {}),
  };

  if (connection.uri) {
    options.uri = connection.uri;
  }

  if (connection.host) {
    options.host = connection.host;
  }

  if (connection.port !== undefined) {
    options.port = connection.port;
  }

  if (connection.user) {
    options.user = connection.user;
  }

  if (connection.password) {
    options.password = connection.password;
  }

  if (connection.database) {
    options.database = connection.database;
  }

  return options;
}
