import { NextFunction, Request, Response } from "express";
import jwt from "jsonwebtoken";
import { SESSION_COOKIE } from "../helper/cookies";

export interface SessionRequest extends Request {
  sessionId?: string;
}

export const signSessionToken = (
  sessionId: string,
  secret: string,
  expiresInSeconds = 12 * 60 * 60
) => jwt.sign({ sessionId }, secret, { expiresIn: expiresInSeconds });

const readToken = (req: Request): string | null => {
  const header = req.headers[SESSION_COOKIE];
  if (typeof header === "string" && header) return header;

  const cookie: unknown = req.cookies?.[SESSION_COOKIE];
  return typeof cookie === "string" && cookie ? cookie : null;
};

/** Verifies the session token and attaches `sessionId` to the request. */
export const sessionAuthentication =
  (secret: string) =>
  (req: SessionRequest, res: Response, next: NextFunction) => {
    const token = readToken(req);
    if (!token) {
      return res.status(401).json({ status: false, message: "Session required" });
    }

    try {
      const decoded = jwt.verify(token, secret);
      if (
        typeof decoded === "string" ||
        typeof decoded.sessionId !== "string" ||
        !decoded.sessionId
      ) {
        return res
          .status(401)
          .json({ status: false, message: "Invalid token payload" });
      }

      req.sessionId = decoded.sessionId;
      next();
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : "Invalid token";
      return res.status(401).json({ status: false, message });
    }
  };
