import type { StorageBackend } from "../backend/StorageBackend";
import { SessionStoreError, type Logger } from "../errors";
import { normalizeLifetime } from "../utils/time";

export type SessionEngineState = "idle" | "opened" | "locked" | "loaded" | "closed";

export type SessionEngineOptions = {
  maxLifetimeSeconds?: number; // default 1440
  logger?: Logger;
};

const DEFAULT_MAX_LIFETIME_SECONDS = 1440;

/**
 * Drives one request's session lifecycle on top of a {@link StorageBackend}.
 *
 * The first `read` of a request begins a transaction (when the backend locks) and
 * loads the row; later reads are served from memory. `close` commits, which releases
 * the row lock, then runs any requested garbage collection.
 */
export class SessionEngine {
  private readonly maxLifetimeSeconds: number;
  private readonly logger: Logger | undefined;

  private currentState: SessionEngineState = "idle";
  private cachedPayload: string | null = null;
  private rowFound = false;
  private lockHeld = false;
  private backendShared = false;
  private gcRequested = false;
  private gcLifetimeSeconds: number;
  private validated = false;

  constructor(
    private readonly backend: StorageBackend,
    options?: SessionEngineOptions,
  ) {
    this.maxLifetimeSeconds = normalizeLifetime(options?.maxLifetimeSeconds ?? DEFAULT_MAX_LIFETIME_SECONDS);
    this.gcLifetimeSeconds = this.maxLifetimeSeconds;
    this.logger = options?.logger;
  }

  get state(): SessionEngineState {
    return this.currentState;
  }

  isLockHeld(): boolean {
    return this.lockHeld;
  }

  isGcRequested(): boolean {
    return this.gcRequested;
  }

  isValidated(): boolean {
    return this.validated;
  }

  async open(): Promise<boolean> {
    if (this.currentState === "closed") {
      throw invalidState("open", this.currentState);
    }
    if (this.currentState === "idle") {
      this.currentState = "opened";
    }
    return true;
  }

  /**
   * Returns the session payload, loading it at most once per request. A missing or
   * expired row reads as `""`.
   */
  async read(sessionId: string, maxLifetimeSeconds: number = this.maxLifetimeSeconds): Promise<string> {
    this.assertUsable("read");
    return this.load(sessionId, maxLifetimeSeconds);
  }

  async write(sessionId: string, data: string): Promise<boolean> {
    this.assertUsable("write");
    const saved = await this.backend.save(sessionId, data);
    if (saved) {
      this.cachedPayload = data;
      this.rowFound = true;
    }
    return saved;
  }

  /**
   * Deletes the row. A lock taken by an earlier read stays held until {@link close}.
   */
  async destroy(sessionId: string): Promise<boolean> {
    this.assertUsable("destroy");
    return this.backend.delete(sessionId);
  }

  /**
   * Schedules a bulk expiry for {@link close}, after the transaction has committed.
   */
  requestGc(maxLifetimeSeconds: number = this.maxLifetimeSeconds): void {
    this.assertUsable("requestGc");
    this.gcLifetimeSeconds = normalizeLifetime(maxLifetimeSeconds);
    this.gcRequested = true;
  }

  /**
   * Loads the row like {@link read} and reports whether it exists and has not expired.
   */
  async validateOnce(sessionId: string, maxLifetimeSeconds: number = this.maxLifetimeSeconds): Promise<boolean> {
    this.assertUsable("validateOnce");
    this.validated = true;
    await this.load(sessionId, maxLifetimeSeconds);
    return this.rowFound;
  }

  /**
   * Commits the transaction this engine began, then runs requested gc. In-memory
   * state is reset even when the commit fails; that failure is rethrown afterwards.
   */
  async close(): Promise<boolean> {
    if (this.currentState === "closed") {
      return true;
    }
    return this.finish("commit");
  }

  /**
   * Opens the engine, runs `fn` and always closes. When `fn` throws the transaction
   * is rolled back instead of committed and the error from `fn` is rethrown.
   */
  async withSession<T>(fn: (engine: SessionEngine) => Promise<T>): Promise<T> {
    await this.open();

    let result: T;
    try {
      result = await fn(this);
    } catch (error) {
      try {
        await this.finish("rollback");
      } catch (releaseError) {
        this.logger?.warn("Failed to release session after an error.", { error: releaseError });
      }
      throw error;
    }

    await this.close();
    return result;
  }

  private async load(sessionId: string, maxLifetimeSeconds: number): Promise<string> {
    if (this.cachedPayload !== null) {
      return this.cachedPayload;
    }

    if (this.backend.isLockingEnabled() && !this.lockHeld) {
      // a transaction this engine did not begin belongs to another request
      if (this.backend.inTransaction() || !(await this.backend.beginTransaction())) {
        this.backendShared = true;
        throw new SessionStoreError(
          "INVALID_STATE",
          "The storage backend is already in a transaction owned by another session engine.",
          undefined,
          { sessionIdLength: sessionId.length },
        );
      }
      this.lockHeld = true;
      this.currentState = "locked";
    }

    const payload = await this.backend.select(sessionId, maxLifetimeSeconds);
    this.rowFound = payload !== null;
    this.cachedPayload = payload ?? "";
    this.currentState = "loaded";
    return this.cachedPayload;
  }

  private async finish(mode: "commit" | "rollback"): Promise<boolean> {
    let releaseError: unknown = null;
    let released = true;
    const owned = this.lockHeld;
    const shared = this.backendShared;

    try {
      if (owned) {
        released = mode === "commit" ? await this.backend.commit() : await this.backend.rollback();
      }
    } catch (error) {
      releaseError = error;
    } finally {
      this.reset();
    }

    if (releaseError === null && !released) {
      releaseError = new SessionStoreError("BACKEND_FAILURE", `Session transaction ${mode} failed.`);
    }

    const runGc = this.gcRequested && releaseError === null;
    const gcLifetimeSeconds = this.gcLifetimeSeconds;
    this.gcRequested = false;

    if (runGc) {
      await this.collectGarbage(gcLifetimeSeconds);
    }

    if (!shared) {
      try {
        await this.backend.release?.();
      } catch (error) {
        if (releaseError === null) {
          releaseError = error;
        }
      }
    }

    if (releaseError !== null) {
      throw releaseError;
    }
    return true;
  }

  private async collectGarbage(maxLifetimeSeconds: number): Promise<void> {
    try {
      const ok = await this.backend.gc(maxLifetimeSeconds);
      if (!ok) {
        this.logger?.warn("Session garbage collection reported failure.", { maxLifetimeSeconds });
      }
    } catch (error) {
      this.logger?.warn("Session garbage collection failed.", { maxLifetimeSeconds, error });
    }
  }

  private reset(): void {
    this.cachedPayload = null;
    this.rowFound = false;
    this.lockHeld = false;
    this.backendShared = false;
    this.validated = false;
    this.currentState = "closed";
  }

  private assertUsable(operation: string): void {
    if (this.currentState === "idle" || this.currentState === "closed") {
      throw invalidState(operation, this.currentState);
    }
  }
}

function invalidState(operation: string, state: SessionEngineState): SessionStoreError {
  return new SessionStoreError("INVALID_STATE", `Cannot ${operation} a session engine in state "${state}".`, undefined, {
    operation,
    state,
  });
}
