import { Response } from "express";
import type { UploadedFile as FormFile } from "express-fileupload";
import { EngineName, EngineSet, isEngineName } from "../../engines";
import { errorMessage, errorStatus, HttpError } from "../../helper/httpError";
import type { SessionRequest } from "../../middi/sessionAuth";
import type { UploadedFile } from "../../types/ragTypes";

export const UPLOAD_FIELD = "pdfs";

const requireSession = (req: SessionRequest) => {
  if (!req.sessionId) throw new HttpError(401, "Session required");
  return req.sessionId;
};

const pickEngine = (value: unknown): EngineName => {
  if (value === undefined || value === "") return "rag";
  if (!isEngineName(value)) throw new HttpError(400, `Unknown engine: ${String(value)}`);
  return value;
};

const toUploads = (files: FormFile | FormFile[] | undefined): UploadedFile[] =>
  (Array.isArray(files) ? files : files ? [files] : []).map((f) => ({
    name: f.name,
    data: f.data,
  }));

export const makeTalkWithDocsCtrl = (engines: EngineSet) => {
  //======================== pdf upload ==============================
  const uploadPdfs = async (req: SessionRequest, res: Response) => {
    try {
      const sessionId = requireSession(req);
      const files = toUploads(req.files?.[UPLOAD_FIELD]);

      const outcome = await engines.rag.ingest(sessionId, files);
      return res.status(outcome.success ? 200 : 400).json({
        status: outcome.success,
        message: outcome.success ? outcome.message : outcome.error,
        data: outcome,
      });
    } catch (err: unknown) {
      console.error("UPLOAD_ERR:", err);
      return res
        .status(errorStatus(err))
        .json({ status: false, message: errorMessage(err, "Upload failed") });
    }
  };

  //=============================== chat ===================
  const chat = async (req: SessionRequest, res: Response) => {
    try {
      const sessionId = requireSession(req);
      const body: unknown = req.body;
      const message =
        body && typeof body === "object" && "message" in body ? body.message : undefined;
      const engineName = pickEngine(
        body && typeof body === "object" && "engine" in body ? body.engine : undefined
      );

      if (typeof message !== "string" || !message.trim()) {
        return res.status(400).json({ status: false, message: "message required" });
      }

      const response = await engines[engineName].answer(sessionId, message.trim());
      return res.status(200).json({
        status: true,
        engine: engineName,
        response,
        hasDocuments: engines.rag.hasDocuments(sessionId),
      });
    } catch (err: unknown) {
      console.error("CHAT_ERROR", err);
      return res.status(errorStatus(err)).json({ status: false, message: errorMessage(err) });
    }
  };

  //=============================== history ===================
  const getHistory = async (req: SessionRequest, res: Response) => {
    try {
      const sessionId = requireSession(req);
      const engineName = pickEngine(req.query.engine);
      const messages = await engines[engineName].getHistory(sessionId);

      return res.status(200).json({
        status: true,
        data: { engine: engineName, messages },
        meta: { total: messages.length },
      });
    } catch (err: unknown) {
      console.error("GET_HISTORY_ERR", err);
      return res.status(errorStatus(err)).json({ status: false, message: errorMessage(err) });
    }
  };

  const clearHistory = async (req: SessionRequest, res: Response) => {
    try {
      const sessionId = requireSession(req);
      const engineName = pickEngine(req.query.engine);
      await engines[engineName].clearSession(sessionId);

      return res.status(200).json({
        status: true,
        message: "Chat history cleared",
        hasDocuments: engines.rag.hasDocuments(sessionId),
      });
    } catch (err: unknown) {
      console.error("CLEAR_HISTORY_ERR", err);
      return res.status(errorStatus(err)).json({ status: false, message: errorMessage(err) });
    }
  };

  return { uploadPdfs, chat, getHistory, clearHistory };
};
