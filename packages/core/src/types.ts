import type {CookieOptions, HttpContext} from "./http/HttpContext";
import type {StorageBackend} from "./backend/StorageBackend";
import type {SessionSerializer} from "./session/SessionSerializer";
import type {Logger} from "./errors";

/**
 * Anything that can mint session identifiers of a requested length.
 */
export type IdGenerator = {
    generate(targetLength: number): string;
};

/**
 * Called once per request for a fresh backend. A backend owns a single connection
 * and transaction, so overlapping requests must not share one.
 */
export type BackendSource = (ctx: HttpContext) => StorageBackend | Promise<StorageBackend>;

/**
 * Root configuration for creating a {@link SessionManager} instance.
 */
export type SessionManagerOptions = {
    backend: BackendSource;

    lifetimeSeconds?: number; // default 1800

    cookie?: CookieOptions;

    autoRefresh?: boolean; // default true

    gcProbability?: number; // default 0.01
    random?: () => number; // default Math.random

    serializer?: SessionSerializer;

    idGenerator?: IdGenerator;

    hooks?: {
        onInvalidSession?: (ctx: HttpContext, sessionId: string) => Promise<void> | void;
    };

    logger?: Logger;
};
