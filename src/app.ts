import express from "express";
import cors from "cors";
import cookieParser from "cookie-parser";
import fileUpload from "express-fileupload";

import type { RagConfig } from "./config";
import type { EngineSet } from "./engines";
import { ragRouter } from "./route/ragRoute";

export interface AppServices {
  engines: EngineSet;
  config: Pick<RagConfig, "maxFileSizeMb" | "maxFileCount">;
  jwtSecret: string;
  corsOrigins: string[];
}

const createApp = ({ engines, config, jwtSecret, corsOrigins }: AppServices) => {
  const app = express();
  app.set("trust proxy", true);

  app.use(
    cors({
      origin: corsOrigins,
      methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization", "X-Requested-With", "x-session-token"],
      credentials: true,
      preflightContinue: false,
      optionsSuccessStatus: 204,
    })
  );

  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));
  app.use(cookieParser());

  // one MB of slack so the ingestor can report oversized files itself
  app.use(
    fileUpload({
      limits: {
        fileSize: (config.maxFileSizeMb + 1) * 1024 * 1024,
        files: config.maxFileCount + 1,
      },
      abortOnLimit: true,
      useTempFiles: false,
    })
  );

  app.use("/", ragRouter(engines, jwtSecret));

  app.get("/", (req, res) =>
    res.status(200).json({ message: "App is working perfect" })
  );

  return app;
};

export default createApp;
