import cors from "cors";
import express from "express";
import { createIngestRouter } from "./routes/ingest";
import { createPhotosRouter } from "./routes/photos";
import { createQueryRouter } from "./routes/query";
import { sendOutcome } from "./routes/respond";
import type { PhotoSearchService } from "./services/photoSearch";

export function createApp(service: PhotoSearchService): express.Express {
  const app = express();
  app.use(cors());
  // Query images arrive base64-encoded in the body
  app.use(express.json({ limit: "25mb" }));

  app.get("/health", async (_req, res) => {
    const outcome = await service.stats();
    if (!outcome.ok) {
      res.status(500).json({ status: "error", error: outcome.message, timestamp: new Date().toISOString() });
      return;
    }
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      storage: {
        type: outcome.value.storeType,
        records: outcome.value.records,
        photos: outcome.value.photos,
      },
      provider: outcome.value.provider,
    });
  });

  app.get("/models", async (_req, res) => {
    const outcome = await service.listAvailableModels();
    sendOutcome(res, outcome, "Listing models", (models) => ({ models }));
  });

  app.use("/ingest", createIngestRouter(service));
  app.use("/query", createQueryRouter(service));
  app.use("/photos", createPhotosRouter(service));

  return app;
}
