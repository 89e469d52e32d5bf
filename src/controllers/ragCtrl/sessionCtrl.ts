import { Response } from "express";
import { v4 as uuidv4 } from "uuid";
import type { EngineSet } from "../../engines";
import { makeCookieOptions, SESSION_COOKIE } from "../../helper/cookies";
import { errorMessage } from "../../helper/httpError";
import { SessionRequest, signSessionToken } from "../../middi/sessionAuth";

export const makeSessionCtrl = (engines: EngineSet, jwtSecret: string) => {
  // ===================== START =====================
  const startSession = async (req: SessionRequest, res: Response) => {
    try {
      const sessionId = uuidv4();
      const token = signSessionToken(sessionId, jwtSecret);
      res.cookie(SESSION_COOKIE, token, makeCookieOptions(req));

      return res.status(201).json({
        status: true,
        message: "Session started",
        data: { sessionId },
        token,
      });
    } catch (err: unknown) {
      console.error("SESSION_START_ERR:", err);
      return res.status(500).json({ status: false, message: errorMessage(err) });
    }
  };

  // ===================== END (logout cleanup) =====================
  const endSession = async (req: SessionRequest, res: Response) => {
    try {
      const sessionId = req.sessionId;
      if (!sessionId) {
        return res.status(401).json({ status: false, message: "Session required" });
      }

      const deleted = await engines.rag.deleteSession(sessionId);
      await engines.records.clearSession(sessionId);
      res.clearCookie(SESSION_COOKIE, makeCookieOptions(req));

      return res.status(200).json({
        status: deleted,
        message: deleted ? "Session ended" : "Session ended with cleanup errors",
      });
    } catch (err: unknown) {
      console.error("SESSION_END_ERR:", err);
      return res.status(500).json({ status: false, message: errorMessage(err) });
    }
  };

  return { startSession, endSession };
};
