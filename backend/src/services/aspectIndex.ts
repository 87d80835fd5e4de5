import { createHash } from "crypto";
import { ValidationError } from "../errors";
import type { PhotoRecord, SearchResult } from "../types";
import type { MetadataFilter, VectorRecord, VectorStore } from "./vectorStore";

export const DEFAULT_ASPECT = "default";

export type QueryFilter = {
  aspect?: string;
  photoPath?: string;
};

/** Deterministic primary key for a (photo, aspect) pair. */
export function entryIdFor(photoPath: string, aspectName: string): string {
  return createHash("sha256").update(JSON.stringify([photoPath, aspectName])).digest("hex");
}

/**
 * One record per (photoPath, aspectName). Upserts replace the whole record;
 * the backend store serializes writes to the same id.
 */
export class AspectIndex {
  private expectedDimension: Promise<number> | null = null;

  constructor(private readonly store: VectorStore) {}

  get storeKind(): VectorStore["kind"] {
    return this.store.kind;
  }

  async upsert(photoPath: string, aspectName: string, embedding: number[], description: string): Promise<PhotoRecord> {
    requireKey(photoPath, aspectName);
    requireVector(embedding);
    assertDimension(embedding, await this.expectDimension(embedding.length));
    const entryId = entryIdFor(photoPath, aspectName);
    try {
      await this.store.upsert([
        {
          id: entryId,
          document: description,
          metadata: { photo_path: photoPath, aspect_name: aspectName },
          embedding,
        },
      ]);
    } catch (error) {
      // The claimed dimension may never have reached the store.
      this.expectedDimension = null;
      throw error;
    }
    return { entryId, photoPath, aspectName, description, embedding };
  }

  async query(embedding: number[], k: number, filter: QueryFilter = {}): Promise<SearchResult[]> {
    const topK = Math.floor(k);
    if (!(topK > 0)) return [];
    requireVector(embedding);
    const expected = this.expectedDimension ? await this.expectedDimension : await this.store.dimension();
    if (expected !== null) assertDimension(embedding, expected);
    const hits = await this.store.query({ embedding, topK, where: toFilter(filter) });
    return hits.slice(0, topK).map((h) => ({
      photoPath: h.metadata.photo_path,
      aspectName: h.metadata.aspect_name,
      distance: h.distance,
      description: h.document,
    }));
  }

  /** Deletes one aspect, or every aspect of the photo when none is given. */
  async delete(photoPath: string, aspectName?: string): Promise<number> {
    if (aspectName !== undefined) {
      return this.store.delete({ ids: [entryIdFor(photoPath, aspectName)] });
    }
    return this.store.delete({ where: { photo_path: photoPath } });
  }

  async get(photoPath: string, aspectName: string): Promise<PhotoRecord | null> {
    const [record] = await this.store.get({ ids: [entryIdFor(photoPath, aspectName)], withEmbeddings: true });
    return record ? toPhotoRecord(record) : null;
  }

  async has(photoPath: string, aspectName: string): Promise<boolean> {
    const records = await this.store.get({ ids: [entryIdFor(photoPath, aspectName)] });
    return records.length > 0;
  }

  async listAspects(photoPath: string): Promise<PhotoRecord[]> {
    const records = await this.store.get({ where: { photo_path: photoPath }, withEmbeddings: true });
    return records.map(toPhotoRecord).sort((a, b) => a.aspectName.localeCompare(b.aspectName));
  }

  async listPhotoPaths(): Promise<string[]> {
    const records = await this.store.get({});
    return [...new Set(records.map((r) => r.metadata.photo_path))].sort();
  }

  count(): Promise<number> {
    return this.store.count();
  }

  async clear(): Promise<void> {
    await this.store.clear();
    this.expectedDimension = null;
  }

  /**
   * The first writer claims the dimension synchronously, so concurrent first
   * upserts of different lengths cannot both pass.
   */
  private expectDimension(length: number): Promise<number> {
    if (this.expectedDimension === null) {
      const pending: Promise<number> = this.store.dimension().then(
        (stored) => stored ?? length,
        (error: unknown) => {
          if (this.expectedDimension === pending) this.expectedDimension = null;
          throw error;
        }
      );
      this.expectedDimension = pending;
    }
    return this.expectedDimension;
  }
}

function requireVector(embedding: number[]): void {
  if (embedding.length === 0) throw new ValidationError("Embedding must not be empty");
  if (!embedding.every(Number.isFinite)) throw new ValidationError("Embedding contains non-finite values");
}

function assertDimension(embedding: number[], expected: number): void {
  if (embedding.length !== expected) {
    throw new ValidationError(`Embedding has ${embedding.length} dimensions, the index holds ${expected}`);
  }
}

function requireKey(photoPath: string, aspectName: string): void {
  if (photoPath.trim().length === 0) throw new ValidationError("photoPath must not be empty");
  if (aspectName.trim().length === 0) throw new ValidationError("aspectName must not be empty");
}

function toFilter(filter: QueryFilter): MetadataFilter | undefined {
  const where: MetadataFilter = {};
  if (filter.aspect !== undefined) where.aspect_name = filter.aspect;
  if (filter.photoPath !== undefined) where.photo_path = filter.photoPath;
  return Object.keys(where).length > 0 ? where : undefined;
}

function toPhotoRecord(record: VectorRecord): PhotoRecord {
  return {
    entryId: record.id,
    photoPath: record.metadata.photo_path,
    aspectName: record.metadata.aspect_name,
    description: record.document,
    embedding: record.embedding,
  };
}
