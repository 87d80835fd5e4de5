export type RecordMetadata = {
  photo_path: string;
  aspect_name: string;
};

/** Equality filter on record metadata; every given field must match. */
export type MetadataFilter = Partial<RecordMetadata>;

export type VectorRecord = {
  id: string;
  document: string;
  metadata: RecordMetadata;
  embedding: number[];
};

export type StoredRecord = Omit<VectorRecord, "embedding">;

export type ScoredRecord = StoredRecord & { distance: number };

export interface VectorStore {
  readonly kind: "chroma" | "local";
  upsert(records: VectorRecord[]): Promise<void>;
  get(input: { ids?: string[]; where?: MetadataFilter; withEmbeddings?: boolean }): Promise<VectorRecord[]>;
  /** Nearest neighbours by ascending distance; may return fewer than topK. */
  query(input: { embedding: number[]; topK: number; where?: MetadataFilter }): Promise<ScoredRecord[]>;
  /** Returns the number of records removed. */
  delete(input: { ids?: string[]; where?: MetadataFilter }): Promise<number>;
  count(where?: MetadataFilter): Promise<number>;
  /** Dimensionality of the stored embeddings, or null while empty. */
  dimension(): Promise<number | null>;
  clear(): Promise<void>;
  healthCheck(): Promise<boolean>;
}

export function matchesFilter(metadata: RecordMetadata, where?: MetadataFilter): boolean {
  if (!where) return true;
  if (where.photo_path !== undefined && metadata.photo_path !== where.photo_path) return false;
  if (where.aspect_name !== undefined && metadata.aspect_name !== where.aspect_name) return false;
  return true;
}
