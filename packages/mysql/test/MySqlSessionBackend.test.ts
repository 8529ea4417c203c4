import { describe, expect, it } from "vitest";
import { SessionEngine, SessionStoreError } from "@rowsession/core";
import { MySqlSessionBackend, classifyMySqlError, createTableSql, type MySqlConnectionLike } from "../src";
import { FakeMySqlConnection, driverError } from "./fakeMySqlConnection";

const START = Date.UTC(2024, 0, 1, 12, 0, 0);

function createClock(start = START) {
  let now = start;
  return {
    now: () => now,
    advanceSeconds(seconds: number): void {
      now += seconds * 1000;
    },
  };
}

async function captureError(promise: Promise<unknown>): Promise<SessionStoreError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof SessionStoreError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected the promise to reject.");
}

describe("MySqlSessionBackend", () => {
  it("sends the expected statements with UTC datetime values", async () => {
    const connection = new FakeMySqlConnection();
    const backend = new MySqlSessionBackend(connection, { clock: () => START });

    await backend.save("sid-1", "a=1");
    await expect(backend.select("sid-1", 1800)).resolves.toBe("a=1");
    await backend.delete("sid-1");
    await backend.gc(1800);

    expect(connection.statements).toEqual([
      {
        sql: "REPLACE INTO `sessions` (id, session_data, last_activity) VALUES (?, ?, ?)",
        values: ["sid-1", "a=1", "2024-01-01 12:00:00"],
      },
      {
        sql: "SELECT session_data FROM `sessions` WHERE id = ? AND last_activity >= ? FOR UPDATE",
        values: ["sid-1", "2024-01-01 11:30:00"],
      },
      {
        sql: "DELETE FROM `sessions` WHERE id = ?",
        values: ["sid-1"],
      },
      {
        sql: "DELETE FROM `sessions` WHERE last_activity < ?",
        values: ["2024-01-01 11:30:00"],
      },
    ]);
    expect(backend.hitCount).toBe(4);
  });

  it("omits FOR UPDATE when locking is disabled and honours a custom table", async () => {
    const connection = new FakeMySqlConnection();
    const backend = new MySqlSessionBackend(connection, {
      clock: () => START,
      lockingEnabled: false,
      tableName: "app_sessions",
    });

    await backend.select("sid-1", 60);

    expect(backend.isLockingEnabled()).toBe(false);
    expect(connection.statements[0]?.sql).toBe(
      "SELECT session_data FROM `app_sessions` WHERE id = ? AND last_activity >= ?",
    );
  });

  it("keeps a row exactly at the threshold and collects it one second later", async () => {
    const clock = createClock();
    const connection = new FakeMySqlConnection();
    const backend = new MySqlSessionBackend(connection, { clock: clock.now });

    await backend.save("sid-edge", "edge");
    clock.advanceSeconds(1800);

    await expect(backend.select("sid-edge", 1800)).resolves.toBe("edge");
    await backend.gc(1800);
    expect([...connection.rows.keys()]).toEqual(["sid-edge"]);

    clock.advanceSeconds(1);

    await expect(backend.select("sid-edge", 1800)).resolves.toBeNull();
    await backend.gc(1800);
    expect(connection.rows.size).toBe(0);
  });

  it("treats deleting a missing row as success", async () => {
    const backend = new MySqlSessionBackend(new FakeMySqlConnection());

    await expect(backend.delete("sid-none")).resolves.toBe(true);
  });

  it("decodes binary session_data", async () => {
    const connection: MySqlConnectionLike = {
      async execute(): Promise<[unknown, unknown]> {
        return [[{ session_data: Buffer.from("name=alice", "utf8") }], []];
      },
      async beginTransaction(): Promise<void> {},
      async commit(): Promise<void> {},
      async rollback(): Promise<void> {},
    };

    await expect(new MySqlSessionBackend(connection).select("sid-1", 60)).resolves.toBe("name=alice");
  });

  it("rejects an unexpected row shape instead of reporting an empty session", async () => {
    const connection: MySqlConnectionLike = {
      async execute(): Promise<[unknown, unknown]> {
        return [[{ payload: "x" }], []];
      },
      async beginTransaction(): Promise<void> {},
      async commit(): Promise<void> {},
      async rollback(): Promise<void> {},
    };

    const error = await captureError(new MySqlSessionBackend(connection).select("sid-1", 60));
    expect(error.code).toBe("BACKEND_FAILURE");
  });

  it("drives a locking request through the engine in one transaction", async () => {
    const connection = new FakeMySqlConnection();
    const backend = new MySqlSessionBackend(connection, { clock: () => START });
    const engine = new SessionEngine(backend, { maxLifetimeSeconds: 1800 });

    await engine.open();
    await expect(engine.read("sid-engine")).resolves.toBe("");
    await engine.read("sid-engine");
    await engine.write("sid-engine", "n=1");
    await engine.close();

    expect(connection.events).toEqual(["begin", "commit"]);
    expect(backend.hitCount).toBe(2);
    expect(connection.rows.get("sid-engine")).toEqual({
      session_data: "n=1",
      last_activity: "2024-01-01 12:00:00",
    });
  });

  it("ends a managed connection when the engine closes", async () => {
    const connection = new FakeMySqlConnection();
    const backend = new MySqlSessionBackend({ connection, manageConnection: true });
    const engine = new SessionEngine(backend);

    await engine.open();
    await engine.read("sid-managed");
    await engine.close();

    expect(connection.events).toEqual(["begin", "commit", "end"]);
  });

  it("leaves a borrowed connection open", async () => {
    const connection = new FakeMySqlConnection();
    const backend = new MySqlSessionBackend(connection);

    await backend.release();

    expect(connection.events).toEqual([]);
  });

  it("classifies driver failures by error code", async () => {
    const connection = new FakeMySqlConnection();
    const backend = new MySqlSessionBackend(connection);
    const lockError = driverError("ER_LOCK_WAIT_TIMEOUT", "Lock wait timeout exceeded; try restarting transaction");

    connection.failNextWith(lockError);
    const lock = await captureError(backend.select("sid-1", 60));
    expect(lock.code).toBe("LOCK_TIMEOUT");
    expect(lock.cause).toBe(lockError);
    expect(lock.details).toEqual({ operation: "select", mysqlCode: "ER_LOCK_WAIT_TIMEOUT" });

    connection.failNextWith(driverError("ECONNRESET", "read ECONNRESET"));
    await expect(captureError(backend.save("sid-1", "a=1"))).resolves.toMatchObject({
      code: "STORE_UNAVAILABLE",
    });

    connection.failNextWith(driverError("ER_NO_SUCH_TABLE", "Table 'app.sessions' doesn't exist"));
    await expect(captureError(backend.gc(60))).resolves.toMatchObject({
      code: "BACKEND_FAILURE",
      message: "MySQL session gc failed.",
    });
  });

  it("maps transaction failures with the same classification", async () => {
    const connection = new FakeMySqlConnection();
    const backend = new MySqlSessionBackend(connection);

    connection.failNextWith(driverError("PROTOCOL_CONNECTION_LOST", "Connection lost: The server closed the connection."));
    const error = await captureError(backend.beginTransaction());

    expect(error.code).toBe("STORE_UNAVAILABLE");
    expect(error.details).toEqual({ operation: "begin", mysqlCode: "PROTOCOL_CONNECTION_LOST" });
    expect(backend.inTransaction()).toBe(false);
  });

  it("recognises connection failures without a code", () => {
    expect(classifyMySqlError(new Error("Can't add new command when connection is in closed state"))).toBe(
      "STORE_UNAVAILABLE",
    );
    expect(classifyMySqlError(driverError("ER_LOCK_DEADLOCK", "Deadlock found"))).toBe("LOCK_TIMEOUT");
    expect(classifyMySqlError("boom")).toBe("BACKEND_FAILURE");
  });

  it("validates its configuration", () => {
    const connection = new FakeMySqlConnection();

    expect(() => new MySqlSessionBackend(connection, { sessionIdLength: 100 })).toThrow(
      "Session ID length cannot be less than 256.",
    );
    expect(() => new MySqlSessionBackend(connection, { tableName: "" })).toThrow("Table name cannot be empty.");
    expect(() => new MySqlSessionBackend(connection, { tableName: "drop table;" })).toThrow(
      "Invalid table name: drop table;",
    );
    expect(new MySqlSessionBackend(connection, { sessionIdLength: 300 }).sessionIdLength()).toBe(300);
  });

  it("renders the table definition", () => {
    expect(createTableSql("sessions", 300)).toBe(
      [
        "CREATE TABLE IF NOT EXISTS `sessions` (",
        "  `id` VARCHAR(300) NOT NULL,",
        "  `session_data` MEDIUMTEXT NOT NULL,",
        "  `last_activity` DATETIME NOT NULL,",
        "  PRIMARY KEY (`id`),",
        "  KEY `last_activity_idx` (`last_activity`)",
        ") ENGINE=InnoDB",
      ].join("\n"),
    );
  });
});
