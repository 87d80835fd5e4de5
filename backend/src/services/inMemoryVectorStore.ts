import fs from "fs";
import path from "path";
import { z } from "zod";
import { StoreError, getErrorMessage } from "../errors";
import {
  matchesFilter,
  type MetadataFilter,
  type ScoredRecord,
  type VectorRecord,
  type VectorStore,
} from "./vectorStore";

const SnapshotSchema = z.array(
  z.object({
    id: z.string(),
    document: z.string(),
    metadata: z.object({ photo_path: z.string(), aspect_name: z.string() }),
    embedding: z.array(z.number()),
  })
);

export type InMemoryStoreOptions = {
  name: string;
  /** Directory for the JSON snapshot; omit to keep everything in memory. */
  storageDir?: string;
};

/**
 * Local store: records live in a Map and, when a storage directory is given,
 * are written to `<storageDir>/<name>.json` before a mutation takes effect.
 * A failed write leaves memory unchanged. Each operation runs to completion
 * within one event-loop turn, so writes to the same id never interleave.
 */
export class InMemoryVectorStore implements VectorStore {
  readonly kind = "local";
  private records = new Map<string, VectorRecord>();
  private readonly filePath: string | null;

  constructor(options: InMemoryStoreOptions) {
    this.filePath = options.storageDir ? path.join(options.storageDir, `${options.name}.json`) : null;
    if (this.filePath) this.load(this.filePath);
  }

  async upsert(records: VectorRecord[]): Promise<void> {
    if (records.length === 0) return;
    const next = new Map(this.records);
    for (const r of records) {
      next.set(r.id, {
        id: r.id,
        document: r.document,
        metadata: { ...r.metadata },
        embedding: [...r.embedding],
      });
    }
    this.commit(next);
  }

  async get({
    ids,
    where,
    withEmbeddings = false,
  }: {
    ids?: string[];
    where?: MetadataFilter;
    withEmbeddings?: boolean;
  }): Promise<VectorRecord[]> {
    const candidates = ids
      ? ids.flatMap((id) => {
          const r = this.records.get(id);
          return r ? [r] : [];
        })
      : [...this.records.values()];
    return candidates
      .filter((r) => matchesFilter(r.metadata, where))
      .map((r) => ({
        id: r.id,
        document: r.document,
        metadata: { ...r.metadata },
        embedding: withEmbeddings ? [...r.embedding] : [],
      }));
  }

  async query({
    embedding,
    topK,
    where,
  }: {
    embedding: number[];
    topK: number;
    where?: MetadataFilter;
  }): Promise<ScoredRecord[]> {
    if (topK <= 0) return [];
    const scored: ScoredRecord[] = [];
    for (const r of this.records.values()) {
      if (!matchesFilter(r.metadata, where)) continue;
      scored.push({
        id: r.id,
        document: r.document,
        metadata: { ...r.metadata },
        distance: 1 - cosine(r.embedding, embedding),
      });
    }
    scored.sort((a, b) => a.distance - b.distance || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    return scored.slice(0, topK);
  }

  async delete({ ids, where }: { ids?: string[]; where?: MetadataFilter }): Promise<number> {
    const victims = await this.get({ ids, where });
    if (victims.length === 0) return 0;
    const next = new Map(this.records);
    for (const r of victims) next.delete(r.id);
    this.commit(next);
    return victims.length;
  }

  async count(where?: MetadataFilter): Promise<number> {
    if (!where) return this.records.size;
    return (await this.get({ where })).length;
  }

  async dimension(): Promise<number | null> {
    for (const r of this.records.values()) return r.embedding.length;
    return null;
  }

  async clear(): Promise<void> {
    this.commit(new Map());
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  private load(filePath: string): void {
    if (!fs.existsSync(filePath)) return;
    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(filePath, "utf8"));
    } catch (err) {
      throw new StoreError(`Failed to load ${filePath}: ${getErrorMessage(err)}`, { cause: err });
    }
    const parsed = SnapshotSchema.safeParse(data);
    if (!parsed.success) {
      throw new StoreError(`Failed to load ${filePath}: ${parsed.error.message}`);
    }
    for (const item of parsed.data) this.records.set(item.id, item);
  }

  /** Persists `next` and only then makes it the live state. */
  private commit(next: Map<string, VectorRecord>): void {
    this.save(next);
    this.records = next;
  }

  private save(records: Map<string, VectorRecord>): void {
    if (!this.filePath) return;
    const tmp = `${this.filePath}.tmp`;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(tmp, JSON.stringify([...records.values()]));
      fs.renameSync(tmp, this.filePath);
    } catch (err) {
      throw new StoreError(`Failed to save ${this.filePath}: ${getErrorMessage(err)}`, { cause: err });
    }
  }
}

export function cosine(a: number[], b: number[]): number {
  const len = Math.min(a.length, b.length);
  let dot = 0,
    na = 0,
    nb = 0;
  for (let i = 0; i < len; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  const d = Math.sqrt(na) * Math.sqrt(nb) || 1;
  return dot / d;
}
