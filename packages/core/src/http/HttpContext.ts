/**
 * Cookie attributes shared by rowsession core and adapters.
 */
export type CookieOptions = {
    name?: string; // default "sid"
    path?: string; // default "/"
    domain?: string;
    httpOnly?: boolean; // default true
    secure?: boolean; // default false
    sameSite?: "lax" | "strict" | "none"; // default "lax"
};

/**
 * Framework-neutral HTTP context required by the session manager.
 */
export interface HttpContext {
    // Cookie I/O
    getCookie(name: string): string | null;
    setCookie(name: string, value: string, options: CookieOptions & { maxAgeSeconds?: number }): void;
    clearCookie(name: string, options: CookieOptions): void;

    // Per-request session storage
    setSession<T>(value: T): void;
    getSession<T>(): T | null;

    // Response helpers (adapters should implement these)
    status(code: number): void;
    json(body: unknown): void;
}

/**
 * Middleware function signature used by rowsession core.
 */
export type HttpMiddleware = (ctx: HttpContext, next: () => Promise<void>) => Promise<void>;
