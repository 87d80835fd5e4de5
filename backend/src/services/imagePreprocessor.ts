import fs from "fs/promises";
import sharp from "sharp";
import { ImageReadError, getErrorMessage } from "../errors";

export const MAX_EDGE = 1024;

/**
 * Converts raw image bytes to the canonical transport form: sRGB without
 * alpha, longer edge at most MAX_EDGE, PNG, base64.
 */
export async function normalize(raw: Buffer): Promise<string> {
  try {
    const png = await sharp(raw)
      .toColourspace("srgb")
      .removeAlpha()
      .resize(MAX_EDGE, MAX_EDGE, { fit: "inside", withoutEnlargement: true })
      .png()
      .toBuffer();
    return png.toString("base64");
  } catch (error) {
    throw new ImageReadError(`Cannot decode image: ${getErrorMessage(error)}`, { cause: error });
  }
}

export async function readImage(filePath: string): Promise<string> {
  let raw: Buffer;
  try {
    raw = await fs.readFile(filePath);
  } catch (error) {
    throw new ImageReadError(`Cannot read ${filePath}: ${getErrorMessage(error)}`, { cause: error });
  }
  return normalize(raw);
}
