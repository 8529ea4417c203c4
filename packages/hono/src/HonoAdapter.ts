import {
  defaultErrorBody,
  isSessionStoreError,
  SessionStoreError,
  statusFromErrorCode,
  type CookieOptions,
  type HttpContext,
  type HttpMiddleware,
} from "@rowsession/core";
import type { Context, MiddlewareHandler } from "hono";
import { parse as parseCookie, serialize as serializeCookie, type CookieSerializeOptions } from "cookie";

/**
 * Context key under which the request's session is stored.
 */
export const ROWSESSION_HONO_SESSION_KEY = "session";

/**
 * Adapter options for Hono integration.
 */
export type HonoAdapterOptions = {
  onError?: (error: SessionStoreError, c: Context) => Promise<Response | void> | Response | void;
};

type HonoHttpContext = HttpContext & {
  _getDirectResponse: () => Response | null;
};

/**
 * Creates a framework-neutral `HttpContext` from Hono context.
 */
export function createHonoHttpContext(c: Context): HttpContext {
  return createContext(c);
}

function createContext(c: Context): HonoHttpContext {
  let statusCode = 200;
  let directResponse: Response | null = null;

  const ctx: HonoHttpContext = {
    getCookie(name: string): string | null {
      const raw = c.req.header("cookie");
      if (!raw) {
        return null;
      }

      const parsed = parseCookie(raw);
      return parsed[name] ?? null;
    },

    setCookie(name, value, options) {
      c.header("Set-Cookie", serializeCookie(name, value, toSerializeOptions(options, options.maxAgeSeconds)), {
        append: true,
      });
    },

    clearCookie(name, options) {
      c.header("Set-Cookie", serializeCookie(name, "", toSerializeOptions(options, 0)), { append: true });
    },

    setSession<T>(value: T): void {
      (c.set as (key: string, value: unknown) => void)(ROWSESSION_HONO_SESSION_KEY, value);
    },

    getSession<T>(): T | null {
      return ((c.get as (key: string) => unknown)(ROWSESSION_HONO_SESSION_KEY) as T | undefined) ?? null;
    },

    status(code: number): void {
      statusCode = code;
      (c.status as (value: number) => void)(code);
    },

    json(body: unknown): void {
      directResponse = (c.json as (value: unknown, status?: number) => Response)(body, statusCode);
    },

    _getDirectResponse(): Response | null {
      return directResponse;
    },
  };

  return ctx;
}

/**
 * Converts core middleware into a Hono middleware handler. Hono awaits the
 * downstream handlers inside `next()`, so the session is committed before the
 * response leaves the middleware. A handler error that Hono already turned into
 * a response (`c.error`) releases the session without writing it.
 */
export function toHonoMiddleware(middleware: HttpMiddleware, options?: HonoAdapterOptions): MiddlewareHandler {
  return async (c, next) => {
    const ctx = createContext(c);

    let nextCalled = false;
    try {
      await middleware(ctx, async () => {
        nextCalled = true;
        await next();
        if (c.error) {
          throw c.error;
        }
      });
    } catch (error) {
      if (nextCalled && error === c.error) {
        return;
      }

      if (isSessionStoreError(error)) {
        if (options?.onError) {
          const handled = await options.onError(error, c);
          if (handled) {
            return handled;
          }
          if (c.finalized) {
            return;
          }
        }
        return (c.json as (value: unknown, status?: number) => Response)(
          defaultErrorBody(error.code, error.message),
          statusFromErrorCode(error.code),
        );
      }
      throw error;
    }

    if (c.finalized || nextCalled) {
      return;
    }

    const response = ctx._getDirectResponse();
    if (response) {
      return response;
    }
    return (c.body as (data: null, status?: number) => Response)(null, c.res.status || 200);
  };
}

function toSerializeOptions(options: CookieOptions, maxAgeSeconds: number | undefined): CookieSerializeOptions {
  const serializeOptions: CookieSerializeOptions = {
    path: options.path ?? "/",
    httpOnly: options.httpOnly ?? true,
  };

  if (options.domain !== undefined) {
    serializeOptions.domain = options.domain;
  }
  if (options.secure !== undefined) {
    serializeOptions.secure = options.secure;
  }
  if (options.sameSite !== undefined) {
    serializeOptions.sameSite = options.sameSite;
  }
  if (maxAgeSeconds !== undefined) {
    serializeOptions.maxAge = maxAgeSeconds;
  }
  return serializeOptions;
}
