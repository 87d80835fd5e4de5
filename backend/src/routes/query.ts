import fs from "fs/promises";
import { Router } from "express";
import { z } from "zod";
import { getErrorMessage } from "../errors";
import type { PhotoSearchService } from "../services/photoSearch";
import { sendFailure, sendInvalid, sendOutcome } from "./respond";

const SearchOptionsSchema = z.object({
  aspect: z.string().min(1).optional(),
  k: z.number().int().min(1).max(100).optional().default(5),
});

const TextQuerySchema = SearchOptionsSchema.extend({
  text: z.string().min(1),
});

const ImageQuerySchema = SearchOptionsSchema.extend({
  imageBase64: z.string().min(1).optional(),
  photoPath: z.string().min(1).optional(),
}).refine((q) => q.imageBase64 !== undefined || q.photoPath !== undefined, {
  message: "Provide either 'imageBase64' or 'photoPath'",
  path: ["imageBase64"],
});

export function createQueryRouter(service: PhotoSearchService): Router {
  const queryRouter = Router();

  queryRouter.post("/text", async (req, res) => {
    const parsed = TextQuerySchema.safeParse(req.body);
    if (!parsed.success) return sendInvalid(res, parsed.error);

    const { text, aspect, k } = parsed.data;
    const outcome = await service.searchByText(text, { aspect, k });
    sendOutcome(res, outcome, "Text search", (results) => ({ results }));
  });

  queryRouter.post("/image", async (req, res) => {
    const parsed = ImageQuerySchema.safeParse(req.body);
    if (!parsed.success) return sendInvalid(res, parsed.error);

    const { imageBase64, photoPath, aspect, k } = parsed.data;
    let image: Buffer;
    if (imageBase64 !== undefined) {
      image = Buffer.from(imageBase64, "base64");
    } else {
      try {
        image = await fs.readFile(photoPath ?? "");
      } catch (err) {
        const message = `Cannot read ${photoPath}: ${getErrorMessage(err)}`;
        return sendFailure(res, { ok: false, kind: "image_read", message }, "Image search");
      }
    }
    const outcome = await service.searchByImage(image, { aspect, k });
    sendOutcome(res, outcome, "Image search", (results) => ({ results }));
  });

  return queryRouter;
}
