import fg from "fast-glob";
import type { Stats } from "fs";
import fs from "fs/promises";
import path from "path";
import { ImageReadError, ProviderError, ValidationError, getErrorMessage, toFailure } from "../errors";
import type { IndexItemResult, IndexingProgress, IndexingSummary, PhotoRecord } from "../types";
import type { AspectIndex } from "./aspectIndex";
import type { EmbeddingProvider } from "./embeddings";
import { readImage } from "./imagePreprocessor";
import { WorkerPool } from "./workerPool";

export const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([".png", ".jpg", ".jpeg"]);

export type IndexingRequest = {
  directory: string;
  aspectName: string;
  prompt?: string;
  concurrency: number;
  /** Leave photos that already have a record for this aspect untouched. */
  skipExisting?: boolean;
  onProgress?: (progress: IndexingProgress) => void;
};

type IndexTask = {
  photoPath: string;
  aspectName: string;
  prompt?: string;
  skipExisting: boolean;
};

export function isImageFile(filePath: string): boolean {
  return IMAGE_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

function isPerFileError(error: unknown): boolean {
  return error instanceof ImageReadError || error instanceof ProviderError;
}

export async function listImageFiles(directory: string): Promise<string[]> {
  const root = path.resolve(directory);
  let stat: Stats;
  try {
    stat = await fs.stat(root);
  } catch (error) {
    throw new ValidationError(`Cannot read directory ${root}: ${getErrorMessage(error)}`, { cause: error });
  }
  if (!stat.isDirectory()) throw new ValidationError(`${root} is not a directory`);

  const files = await fg("**/*", { cwd: root, absolute: true, onlyFiles: true, dot: true });
  return files
    .map((f) => path.normalize(f))
    .filter(isImageFile)
    .sort();
}

export class IndexingPipeline {
  constructor(
    private readonly index: AspectIndex,
    private readonly provider: EmbeddingProvider
  ) {}

  /** Describes, embeds and stores a single photo under one aspect, keyed by its absolute path. */
  async indexPhoto(photoPath: string, aspectName: string, prompt?: string): Promise<PhotoRecord> {
    const absolute = path.resolve(photoPath);
    const image = await readImage(absolute);
    const { description, embedding } = await this.provider.describeAndEmbed(image, prompt);
    return this.index.upsert(absolute, aspectName, embedding, description);
  }

  async run(request: IndexingRequest): Promise<IndexingSummary> {
    const aspectName = request.aspectName.trim();
    if (aspectName.length === 0) throw new ValidationError("aspectName must not be empty");

    const directory = path.resolve(request.directory);
    const files = await listImageFiles(directory);
    const tasks: IndexTask[] = files.map((photoPath) => ({
      photoPath,
      aspectName,
      prompt: request.prompt,
      skipExisting: request.skipExisting ?? false,
    }));

    console.log(`Starting photo indexing - Found ${files.length} images in ${directory}`);

    const pool = new WorkerPool<IndexTask, IndexItemResult>(request.concurrency, (task) => this.processTask(task));
    let completed = 0;
    let items: IndexItemResult[];
    try {
      items = await pool.run(tasks, (item) => {
        completed++;
        if (item.status === "failed") console.error(`[${completed}/${files.length}] ${item.message}`);
        else console.log(`[${completed}/${files.length}] ${item.message}`);
        request.onProgress?.({ completed, total: files.length, item });
      });
    } catch (error) {
      console.error(`Indexing aborted after ${completed}/${files.length} files: ${getErrorMessage(error)}`);
      throw error;
    }

    const summary: IndexingSummary = {
      directory,
      aspectName,
      total: files.length,
      indexed: items.filter((i) => i.status === "indexed").length,
      skipped: items.filter((i) => i.status === "skipped").length,
      failed: items.filter((i) => i.status === "failed").length,
      items: [...items].sort((a, b) => a.photoPath.localeCompare(b.photoPath)),
    };
    console.log(
      `Indexing complete: ${summary.indexed} indexed, ${summary.skipped} skipped, ${summary.failed} errors (${summary.total} files)`
    );
    return summary;
  }

  private async processTask(task: Readonly<IndexTask>): Promise<IndexItemResult> {
    try {
      if (task.skipExisting && (await this.index.has(task.photoPath, task.aspectName))) {
        return { photoPath: task.photoPath, status: "skipped", message: `Skipped ${task.photoPath} (already indexed)` };
      }
      await this.indexPhoto(task.photoPath, task.aspectName, task.prompt);
      return {
        photoPath: task.photoPath,
        status: "indexed",
        message: `Processed ${task.photoPath} for aspect '${task.aspectName}'`,
      };
    } catch (error) {
      // Anything but an unreadable image or a failed model call aborts the run.
      if (!isPerFileError(error)) throw error;
      const failure = toFailure(error);
      return {
        photoPath: task.photoPath,
        status: "failed",
        kind: failure.kind,
        message: `Error processing ${task.photoPath}: ${failure.message}`,
      };
    }
  }
}
