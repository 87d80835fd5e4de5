import { Router } from "express";
import { z } from "zod";
import type { PhotoSearchService } from "../services/photoSearch";
import { sendInvalid, sendOutcome } from "./respond";

const DeleteSchema = z.object({
  photoPath: z.string().min(1),
  aspect: z.string().min(1).optional(),
});

const AspectsQuerySchema = z.object({
  path: z.string().min(1),
});

export function createPhotosRouter(service: PhotoSearchService): Router {
  const photosRouter = Router();

  photosRouter.get("/", async (_req, res) => {
    const outcome = await service.listPhotoPaths();
    sendOutcome(res, outcome, "Listing photos", (photos) => ({ photos }));
  });

  photosRouter.get("/aspects", async (req, res) => {
    const parsed = AspectsQuerySchema.safeParse(req.query);
    if (!parsed.success) return sendInvalid(res, parsed.error);

    const outcome = await service.getPhotoAspects(parsed.data.path);
    sendOutcome(res, outcome, "Listing aspects", (aspects) => ({ aspects }));
  });

  photosRouter.delete("/all", async (_req, res) => {
    const outcome = await service.clear();
    sendOutcome(res, outcome, "Clearing store", () => ({}));
  });

  photosRouter.delete("/", async (req, res) => {
    const parsed = DeleteSchema.safeParse(req.body);
    if (!parsed.success) return sendInvalid(res, parsed.error);

    const { photoPath, aspect } = parsed.data;
    const outcome = await service.delete(photoPath, aspect);
    sendOutcome(res, outcome, `Deleting ${photoPath}`, (deleted) => ({ deleted }));
  });

  return photosRouter;
}
