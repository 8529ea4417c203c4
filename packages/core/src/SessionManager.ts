import type { SessionManagerOptions } from "./types";
import type { HttpContext, HttpMiddleware } from "./http/HttpContext";
import type { StorageBackend } from "./backend/StorageBackend";
import { resolveSessionManagerConfig, type SessionManagerConfig } from "./config";
import { SessionEngine } from "./engine/SessionEngine";
import { SessionStoreError } from "./errors";
import { Session } from "./session/Session";
import type { SessionValues } from "./session/SessionSerializer";

/**
 * Binds the session engine to a request: cookie handling, identifier validation
 * and regeneration, payload decoding and the end-of-request write.
 */
export class SessionManager {
    private readonly config: SessionManagerConfig;

    constructor(options: SessionManagerOptions) {
        this.config = resolveSessionManagerConfig(options);
    }

    /**
     * Starts the session before `next` and ends it afterwards. The values are
     * written back only when `next` succeeds; the engine is closed either way.
     */
    middleware(): HttpMiddleware {
        return async (ctx, next) => {
            const session = await this.start(ctx);
            ctx.setSession(session);

            try {
                await next();
            } catch (error) {
                try {
                    await session.release();
                } catch (releaseError) {
                    this.config.logger?.warn("Failed to release session after an error.", { error: releaseError });
                }
                throw error;
            }

            if (!(await session.commit())) {
                this.config.logger?.warn("Session write was not saved by the backend.", {
                    sessionIdLength: session.id.length,
                });
            }
        };
    }

    /**
     * Returns the session started by {@link middleware} for this request.
     */
    getSession(ctx: HttpContext): Session {
        const found = ctx.getSession<unknown>();
        if (found instanceof Session) {
            return found;
        }
        throw new SessionStoreError("INVALID_STATE", "No session has been started for this request.");
    }

    /**
     * Opens the engine and loads the session named by the request cookie. An
     * identifier that does not resolve to a live row is replaced by a new one.
     */
    async start(ctx: HttpContext): Promise<Session> {
        const backend = await this.resolveBackend(ctx);
        const engine = new SessionEngine(backend, {
            maxLifetimeSeconds: this.config.lifetimeSeconds,
            ...(this.config.logger ? { logger: this.config.logger } : {}),
        });
        await engine.open();

        try {
            const idLength = backend.sessionIdLength();
            const sessionId = await this.resolveSessionId(ctx, engine, idLength);
            const values = this.decode(await engine.read(sessionId), sessionId);

            if (this.config.gcProbability > 0 && this.config.random() < this.config.gcProbability) {
                engine.requestGc();
            }

            return new Session(engine, ctx, this.config, idLength, sessionId, values);
        } catch (error) {
            try {
                await engine.close();
            } catch (closeError) {
                this.config.logger?.warn("Failed to close session after a start error.", { error: closeError });
            }
            throw error;
        }
    }

    private async resolveSessionId(ctx: HttpContext, engine: SessionEngine, idLength: number): Promise<string> {
        const { cookie, lifetimeSeconds } = this.config;
        const incoming = ctx.getCookie(cookie.name);

        if (incoming) {
            if (this.config.autoRefresh) {
                ctx.setCookie(cookie.name, incoming, { ...cookie, maxAgeSeconds: lifetimeSeconds });
            }

            if (await engine.validateOnce(incoming)) {
                return incoming;
            }

            this.config.logger?.debug("Session not found.", { sessionIdLength: incoming.length });
            if (this.config.onInvalidSession) {
                await this.config.onInvalidSession(ctx, incoming);
            }
            await engine.destroy(incoming);
        }

        const sessionId = this.config.idGenerator.generate(idLength);
        ctx.setCookie(cookie.name, sessionId, { ...cookie, maxAgeSeconds: lifetimeSeconds });
        return sessionId;
    }

    private decode(raw: string, sessionId: string): SessionValues {
        try {
            return this.config.serializer.deserialize(raw);
        } catch (error) {
            this.config.logger?.warn("Invalid session payload.", { sessionIdLength: sessionId.length, error });
            return {};
        }
    }

    private async resolveBackend(ctx: HttpContext): Promise<StorageBackend> {
        return this.config.backend(ctx);
    }
}
