import { Router } from "express";
import { z } from "zod";
import type { PhotoSearchService } from "../services/photoSearch";
import { sendInvalid, sendOutcome } from "./respond";

const IngestSchema = z.object({
  directory: z.string().min(1),
  aspect: z.string().min(1).optional().default("default"),
  prompt: z.string().min(1).optional(),
  concurrency: z.number().int().min(1).max(64).optional(),
  skipExisting: z.boolean().optional().default(false),
});

const PhotoSchema = z.object({
  photoPath: z.string().min(1),
  aspect: z.string().min(1).optional().default("default"),
  prompt: z.string().min(1).optional(),
});

export function createIngestRouter(service: PhotoSearchService): Router {
  const ingestRouter = Router();

  // Index every image under a directory for one aspect
  ingestRouter.post("/", async (req, res) => {
    const parsed = IngestSchema.safeParse(req.body);
    if (!parsed.success) return sendInvalid(res, parsed.error);

    const { directory, aspect, prompt, concurrency, skipExisting } = parsed.data;
    const outcome = await service.runIndexing({ directory, aspect, prompt, concurrency, skipExisting });
    sendOutcome(res, outcome, "Indexing", (summary) => ({ summary }));
  });

  // Add or refresh a single photo (also adds a new aspect to an indexed photo)
  ingestRouter.post("/photo", async (req, res) => {
    const parsed = PhotoSchema.safeParse(req.body);
    if (!parsed.success) return sendInvalid(res, parsed.error);

    const { photoPath, aspect, prompt } = parsed.data;
    const outcome = await service.indexPhoto(photoPath, aspect, prompt);
    sendOutcome(res, outcome, `Indexing ${photoPath}`, (record) => ({ record }));
  });

  return ingestRouter;
}
