import type { CookieOptions, Request } from "express";

export const SESSION_COOKIE = "x-session-token";

export function isRequestSecure(req: Request): boolean {
  return req.secure || req.headers["x-forwarded-proto"] === "https";
}

export function makeCookieOptions(req: Request): CookieOptions {
  const secure = isRequestSecure(req);
  return {
    httpOnly: true,
    secure,
    sameSite: secure ? "none" : "lax", // none needs https; lax for localhost
  };
}
