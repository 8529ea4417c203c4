import type {BackendSource, IdGenerator, SessionManagerOptions} from "./types";
import type {HttpContext} from "./http/HttpContext";
import {configurationError, type Logger} from "./errors";
import {jsonSessionSerializer, type SessionSerializer} from "./session/SessionSerializer";
import {SessionIdGenerator} from "./id/SessionIdGenerator";

export const DEFAULT_LIFETIME_SECONDS = 60 * 30;
export const DEFAULT_COOKIE_NAME = "sid";
export const DEFAULT_GC_PROBABILITY = 0.01;

/**
 * Cookie attributes after defaults have been applied.
 */
export type ResolvedCookieOptions = {
    name: string;
    path: string;
    domain?: string;
    httpOnly: boolean;
    secure: boolean;
    sameSite: "lax" | "strict" | "none";
};

/**
 * Fully-defaulted {@link SessionManagerOptions}.
 */
export type SessionManagerConfig = {
    backend: BackendSource;
    lifetimeSeconds: number;
    cookie: ResolvedCookieOptions;
    autoRefresh: boolean;
    gcProbability: number;
    random: () => number;
    serializer: SessionSerializer;
    idGenerator: IdGenerator;
    onInvalidSession: ((ctx: HttpContext, sessionId: string) => Promise<void> | void) | undefined;
    logger: Logger | undefined;
};

function isTokenChar(ch: string): boolean {
    return /^[A-Za-z0-9!#$%&'*+\-.^_`|~]$/.test(ch);
}

/**
 * Applies defaults and rejects invalid settings with a `CONFIGURATION_ERROR`.
 */
export function resolveSessionManagerConfig(options: SessionManagerOptions): SessionManagerConfig {
    const lifetimeSeconds = options.lifetimeSeconds ?? DEFAULT_LIFETIME_SECONDS;
    if (!Number.isInteger(lifetimeSeconds) || lifetimeSeconds <= 0) {
        throw configurationError("lifetimeSeconds must be a positive integer.", {lifetimeSeconds});
    }

    const gcProbability = options.gcProbability ?? DEFAULT_GC_PROBABILITY;
    if (!(gcProbability >= 0 && gcProbability <= 1)) {
        throw configurationError("gcProbability must be between 0 and 1.", {gcProbability});
    }

    if (typeof options.backend !== "function") {
        throw configurationError("backend must be a function that returns a new StorageBackend per request.");
    }

    const name = options.cookie?.name ?? DEFAULT_COOKIE_NAME;
    if (name.length === 0 || [...name].some((ch) => !isTokenChar(ch))) {
        throw configurationError(`Invalid cookie name: ${name}`, {name});
    }

    const cookie: ResolvedCookieOptions = {
        name,
        path: options.cookie?.path ?? "/",
        httpOnly: options.cookie?.httpOnly ?? true,
        secure: options.cookie?.secure ?? false,
        sameSite: options.cookie?.sameSite ?? "lax",
    };
    if (options.cookie?.domain !== undefined) {
        cookie.domain = options.cookie.domain;
    }

    return {
        backend: options.backend,
        lifetimeSeconds,
        cookie,
        autoRefresh: options.autoRefresh ?? true,
        gcProbability,
        random: options.random ?? Math.random,
        serializer: options.serializer ?? jsonSessionSerializer,
        idGenerator: options.idGenerator ?? new SessionIdGenerator(),
        onInvalidSession: options.hooks?.onInvalidSession,
        logger: options.logger,
    };
}
