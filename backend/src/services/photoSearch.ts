import path from "path";
import type { AppConfig } from "../config";
import { ValidationError, toFailure } from "../errors";
import type { IndexingProgress, IndexingSummary, Outcome, PhotoRecord, SearchResult } from "../types";
import { openVectorStore } from "./adaptiveVectorStore";
import { AspectIndex, DEFAULT_ASPECT } from "./aspectIndex";
import { EmbeddingProvider, createEmbeddingProvider } from "./embeddings";
import { IndexingPipeline } from "./indexingPipeline";
import { QueryEngine, type SearchInput, type SearchOptions } from "./queryEngine";

export type StoredPhoto = Omit<PhotoRecord, "embedding">;

export type IndexingInput = {
  directory: string;
  aspect?: string;
  prompt?: string;
  concurrency?: number;
  skipExisting?: boolean;
  onProgress?: (progress: IndexingProgress) => void;
};

export type StoreStats = {
  storeType: string;
  records: number;
  photos: number;
  provider: string;
};

async function attempt<T>(fn: () => Promise<T>): Promise<Outcome<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (error) {
    return toFailure(error);
  }
}

function withoutEmbedding({ embedding: _embedding, ...rest }: PhotoRecord): StoredPhoto {
  return rest;
}

/** Records are keyed by absolute path; blank paths are left for validation to reject. */
function canonicalPath(photoPath: string): string {
  return photoPath.trim().length === 0 ? photoPath : path.resolve(photoPath);
}

/**
 * Public operations for front ends. Nothing here throws: every call resolves
 * to an Outcome carrying either the value or the failure kind and message.
 */
export class PhotoSearchService {
  private readonly pipeline: IndexingPipeline;
  private readonly engine: QueryEngine;

  constructor(
    private readonly index: AspectIndex,
    private readonly provider: EmbeddingProvider,
    private readonly defaults: { concurrency: number }
  ) {
    this.pipeline = new IndexingPipeline(index, provider);
    this.engine = new QueryEngine(index, provider);
  }

  /** Adds or refreshes one photo under an aspect (also how a new aspect is added). */
  indexPhoto(photoPath: string, aspect: string = DEFAULT_ASPECT, prompt?: string): Promise<Outcome<StoredPhoto>> {
    return attempt(async () => withoutEmbedding(await this.pipeline.indexPhoto(photoPath, aspect, prompt)));
  }

  upsert(photoPath: string, aspect: string, embedding: number[], description: string): Promise<Outcome<StoredPhoto>> {
    return attempt(async () =>
      withoutEmbedding(await this.index.upsert(canonicalPath(photoPath), aspect, embedding, description))
    );
  }

  delete(photoPath: string, aspect?: string): Promise<Outcome<number>> {
    return attempt(() => this.index.delete(canonicalPath(photoPath), aspect));
  }

  searchByImage(image: Buffer, options?: SearchOptions): Promise<Outcome<SearchResult[]>> {
    return attempt(() => this.engine.searchByImage(image, options));
  }

  searchByText(text: string, options?: SearchOptions): Promise<Outcome<SearchResult[]>> {
    return attempt(() => this.engine.searchByText(text, options));
  }

  search(input: SearchInput): Promise<Outcome<SearchResult[]>> {
    return attempt(() => this.engine.search(input));
  }

  listPhotoPaths(): Promise<Outcome<string[]>> {
    return attempt(() => this.index.listPhotoPaths());
  }

  getPhotoAspects(photoPath: string): Promise<Outcome<StoredPhoto[]>> {
    return attempt(async () => (await this.index.listAspects(canonicalPath(photoPath))).map(withoutEmbedding));
  }

  clear(): Promise<Outcome<void>> {
    return attempt(() => this.index.clear());
  }

  runIndexing(input: IndexingInput): Promise<Outcome<IndexingSummary>> {
    return attempt(() => {
      const concurrency = input.concurrency ?? this.defaults.concurrency;
      if (!Number.isInteger(concurrency) || concurrency < 1) {
        throw new ValidationError("concurrency must be a positive integer");
      }
      return this.pipeline.run({
        directory: input.directory,
        aspectName: input.aspect ?? DEFAULT_ASPECT,
        prompt: input.prompt,
        concurrency,
        skipExisting: input.skipExisting,
        onProgress: input.onProgress,
      });
    });
  }

  listAvailableModels(): Promise<Outcome<string[]>> {
    return attempt(() => this.provider.listModels());
  }

  stats(): Promise<Outcome<StoreStats>> {
    return attempt(async () => ({
      storeType: this.index.storeKind === "chroma" ? "ChromaDB" : "Local",
      records: await this.index.count(),
      photos: (await this.index.listPhotoPaths()).length,
      provider: this.provider.backendName,
    }));
  }
}

export async function createPhotoSearchService(config: AppConfig): Promise<PhotoSearchService> {
  const store = await openVectorStore(config);
  return new PhotoSearchService(new AspectIndex(store), createEmbeddingProvider(config), {
    concurrency: config.concurrency,
  });
}
