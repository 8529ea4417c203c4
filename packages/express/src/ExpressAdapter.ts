import {
  defaultErrorBody,
  isSessionStoreError,
  statusFromErrorCode,
  SessionStoreError,
  type CookieOptions,
  type HttpContext,
  type HttpMiddleware,
} from "@rowsession/core";
import { parse as parseCookie, serialize as serializeCookie, type CookieSerializeOptions } from "cookie";

export type ExpressRequestLike = {
  headers: Record<string, string | string[] | undefined>;
  session?: unknown;
};

export type ExpressResponseLike = {
  status(code: number): unknown;
  json(body: unknown): unknown;
  getHeader(name: string): unknown;
  setHeader(name: string, value: unknown): unknown;
  headersSent?: boolean;
  once?(event: "finish" | "close", listener: () => void): unknown;
};

export type ExpressNext = (error?: unknown) => void;
export type ExpressHandler = (req: ExpressRequestLike, res: ExpressResponseLike, next: ExpressNext) => Promise<void>;

export type ExpressAdapterOptions = {
  onError?: (error: SessionStoreError, req: ExpressRequestLike, res: ExpressResponseLike) => Promise<void> | void;
};

export function createExpressHttpContext(req: ExpressRequestLike, res: ExpressResponseLike): HttpContext {
  return {
    getCookie(name: string): string | null {
      const header = req.headers.cookie;
      if (!header) {
        return null;
      }

      const parsed = parseCookie(Array.isArray(header) ? header.join("; ") : header);
      return parsed[name] ?? null;
    },

    setCookie(name, value, options) {
      appendSetCookie(res, serializeCookie(name, value, toSerializeOptions(options, options.maxAgeSeconds)));
    },

    clearCookie(name, options) {
      appendSetCookie(res, serializeCookie(name, "", toSerializeOptions(options, 0)));
    },

    setSession<T>(value: T): void {
      req.session = value;
    },

    getSession<T>(): T | null {
      return (req.session as T | undefined) ?? null;
    },

    status(code: number): void {
      res.status(code);
    },

    json(body: unknown): void {
      res.json(body);
    },
  };
}

/**
 * Converts core middleware into an Express handler. Express does not await the
 * rest of the chain, so the session is committed once the response has finished
 * (or the connection closed) rather than when `next()` returns.
 */
export function toExpressMiddleware(middleware: HttpMiddleware, options?: ExpressAdapterOptions): ExpressHandler {
  return async (req, res, next) => {
    const ctx = createExpressHttpContext(req, res);

    try {
      await middleware(ctx, async () => {
        const finished = responseFinished(res);
        next();
        await finished;
      });
    } catch (error) {
      if (isSessionStoreError(error)) {
        if (options?.onError) {
          await options.onError(error, req, res);
          return;
        }

        if (!res.headersSent) {
          res.status(statusFromErrorCode(error.code));
          res.json(defaultErrorBody(error.code, error.message));
          return;
        }
      }

      next(error);
    }
  };
}

function responseFinished(res: ExpressResponseLike): Promise<void> {
  return new Promise((resolve) => {
    if (typeof res.once !== "function") {
      resolve();
      return;
    }

    res.once("finish", resolve);
    res.once("close", resolve);
  });
}

function appendSetCookie(res: ExpressResponseLike, value: string): void {
  const prev = res.getHeader("Set-Cookie");

  if (!prev) {
    res.setHeader("Set-Cookie", value);
    return;
  }

  const list = Array.isArray(prev) ? prev.map(String) : [String(prev)];
  list.push(value);
  res.setHeader("Set-Cookie", list);
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
