import type { SessionEngine } from "../engine/SessionEngine";
import type { SessionManagerConfig } from "../config";
import type { HttpContext } from "../http/HttpContext";
import { SessionStoreError } from "../errors";
import { isPlainObject, type SessionValues } from "./SessionSerializer";

/**
 * One request's view of a session: the decoded values plus the operations that
 * change its identity. Values are written back by {@link Session.commit}.
 */
export class Session implements Iterable<[string, unknown]> {
  private values: SessionValues;
  private sessionId: string;
  private destroyed = false;
  private ended = false;

  constructor(
    private readonly engine: SessionEngine,
    private readonly ctx: HttpContext,
    private readonly config: SessionManagerConfig,
    private readonly idLength: number,
    sessionId: string,
    values: SessionValues,
  ) {
    this.sessionId = sessionId;
    this.values = values;
  }

  get id(): string {
    return this.sessionId;
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  get isEnded(): boolean {
    return this.ended;
  }

  get(key: string, defaultValue: unknown = null): unknown {
    return this.exists(key) ? this.values[key] : defaultValue;
  }

  set(key: string, value: unknown): this {
    this.values[key] = value;
    return this;
  }

  /**
   * Merges `value` into the current value of `key`: plain objects recursively,
   * arrays by concatenation. Anything else replaces the current value.
   */
  merge(key: string, value: unknown): this {
    return this.set(key, mergeValues(this.get(key), value));
  }

  delete(key: string): this {
    if (this.exists(key)) {
      delete this.values[key];
    }
    return this;
  }

  clear(): this {
    this.values = {};
    return this;
  }

  exists(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.values, key);
  }

  count(): number {
    return Object.keys(this.values).length;
  }

  entries(): IterableIterator<[string, unknown]> {
    return Object.entries(this.values)[Symbol.iterator]();
  }

  [Symbol.iterator](): IterableIterator<[string, unknown]> {
    return this.entries();
  }

  toJSON(): SessionValues {
    return { ...this.values };
  }

  /**
   * Moves the values to a freshly minted identifier. With `deleteOld` the previous
   * row is deleted; its lock stays held until the request ends.
   */
  async regenerate(deleteOld = false): Promise<boolean> {
    this.assertActive("regenerate");

    const previous = this.sessionId;
    let deleted = true;
    if (deleteOld) {
      deleted = await this.engine.destroy(previous);
    }

    this.sessionId = this.config.idGenerator.generate(this.idLength);
    this.ctx.setCookie(this.config.cookie.name, this.sessionId, {
      ...this.config.cookie,
      maxAgeSeconds: this.config.lifetimeSeconds,
    });
    this.config.logger?.debug("Session regenerated.", { deletedOld: deleteOld });
    return deleted;
  }

  /**
   * Deletes the row, empties the values and clears the cookie. Nothing is written
   * back when the request ends.
   */
  async destroy(): Promise<boolean> {
    this.assertActive("destroy");

    this.values = {};
    this.destroyed = true;
    try {
      return await this.engine.destroy(this.sessionId);
    } finally {
      this.ctx.clearCookie(this.config.cookie.name, this.config.cookie);
    }
  }

  /**
   * Writes the values back (unless destroyed) and closes the engine, releasing
   * the row lock. Later calls are no-ops.
   */
  async commit(): Promise<boolean> {
    if (this.ended) {
      return true;
    }
    this.ended = true;

    let written = true;
    let writeError: unknown = null;
    try {
      if (!this.destroyed) {
        written = await this.engine.write(this.sessionId, this.config.serializer.serialize(this.values));
      }
    } catch (error) {
      writeError = error;
      throw error;
    } finally {
      try {
        await this.engine.close();
      } catch (error) {
        if (!writeError) {
          throw error;
        }
        this.config.logger?.warn("Failed to close session after a write error.", { error });
      }
    }
    return written;
  }

  /**
   * Closes the engine without writing. Later calls are no-ops.
   */
  async release(): Promise<void> {
    if (this.ended) {
      return;
    }
    this.ended = true;
    await this.engine.close();
  }

  private assertActive(operation: string): void {
    if (this.ended) {
      throw new SessionStoreError("INVALID_STATE", `Cannot ${operation} a session after the request has ended.`);
    }
  }
}

function mergeValues(current: unknown, incoming: unknown): unknown {
  if (Array.isArray(current) && Array.isArray(incoming)) {
    return [...current, ...incoming];
  }

  if (isPlainObject(current) && isPlainObject(incoming)) {
    const out: Record<string, unknown> = { ...current };
    for (const [key, value] of Object.entries(incoming)) {
      out[key] = Object.prototype.hasOwnProperty.call(out, key) ? mergeValues(out[key], value) : value;
    }
    return out;
  }

  return incoming;
}
