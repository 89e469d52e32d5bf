import express from "express";
import { makeSessionCtrl } from "../controllers/ragCtrl/sessionCtrl";
import { makeTalkWithDocsCtrl } from "../controllers/ragCtrl/talkWithDocsApi";
import type { EngineSet } from "../engines";
import { sessionAuthentication } from "../middi/sessionAuth";

export const ragRouter = (engines: EngineSet, jwtSecret: string) => {
  const router = express.Router();
  const auth = sessionAuthentication(jwtSecret);
  const { startSession, endSession } = makeSessionCtrl(engines, jwtSecret);
  const { uploadPdfs, chat, getHistory, clearHistory } =
    makeTalkWithDocsCtrl(engines);

  router.route("/session/start").post(startSession);
  router.route("/session/end").post(auth, endSession);

  router.route("/docs/upload").post(auth, uploadPdfs);

  router.route("/chat").post(auth, chat);
  router.route("/chat/history").get(auth, getHistory).delete(auth, clearHistory);

  return router;
};
