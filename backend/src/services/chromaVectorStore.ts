import { ChromaClient, IncludeEnum, type Collection } from "chromadb";
import { StoreError, getErrorMessage } from "../errors";
import type { MetadataFilter, RecordMetadata, ScoredRecord, VectorRecord, VectorStore } from "./vectorStore";

export type ChromaStoreOptions = {
  url: string;
  collectionName: string;
};

export class ChromaVectorStore implements VectorStore {
  readonly kind = "chroma";
  private client: ChromaClient;
  private collection: Collection | null = null;

  constructor(private readonly options: ChromaStoreOptions) {
    this.client = new ChromaClient({ path: options.url });
  }

  private async getCollection(): Promise<Collection> {
    if (this.collection) return this.collection;
    this.collection = await this.run("open collection", () =>
      this.client.getOrCreateCollection({
        name: this.options.collectionName,
        metadata: {
          description: "Photo descriptions embedded per aspect",
          "hnsw:space": "cosine",
        },
      })
    );
    return this.collection;
  }

  async upsert(records: VectorRecord[]): Promise<void> {
    if (records.length === 0) return;
    const collection = await this.getCollection();
    await this.run("upsert", () =>
      collection.upsert({
        ids: records.map((r) => r.id),
        embeddings: records.map((r) => r.embedding),
        documents: records.map((r) => r.document),
        metadatas: records.map((r) => ({ ...r.metadata })),
      })
    );
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
    const collection = await this.getCollection();
    const include = [IncludeEnum.Documents, IncludeEnum.Metadatas];
    if (withEmbeddings) include.push(IncludeEnum.Embeddings);
    const results = await this.run("get", () => collection.get({ ids, where: toWhere(where), include }));

    const records: VectorRecord[] = [];
    for (let i = 0; i < results.ids.length; i++) {
      const metadata = toMetadata(results.metadatas?.[i]);
      if (!metadata) continue;
      records.push({
        id: results.ids[i],
        document: results.documents?.[i] ?? "",
        metadata,
        embedding: withEmbeddings ? [...(results.embeddings?.[i] ?? [])] : [],
      });
    }
    return records;
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
    // Chroma rejects nResults larger than the candidate set on some versions.
    const available = await this.count(where);
    const nResults = Math.min(topK, available);
    if (nResults <= 0) return [];

    const collection = await this.getCollection();
    const results = await this.run("query", () =>
      collection.query({
        queryEmbeddings: [embedding],
        nResults,
        where: toWhere(where),
        include: [IncludeEnum.Documents, IncludeEnum.Metadatas, IncludeEnum.Distances],
      })
    );

    const ids = results.ids?.[0] ?? [];
    const documents = results.documents?.[0] ?? [];
    const metadatas = results.metadatas?.[0] ?? [];
    const distances = results.distances?.[0] ?? [];

    const records: ScoredRecord[] = [];
    for (let i = 0; i < ids.length; i++) {
      const metadata = toMetadata(metadatas[i]);
      if (!metadata) continue;
      records.push({
        id: ids[i],
        document: documents[i] ?? "",
        metadata,
        distance: distances[i] ?? 0,
      });
    }
    return records.sort((a, b) => a.distance - b.distance || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }

  async delete({ ids, where }: { ids?: string[]; where?: MetadataFilter }): Promise<number> {
    const victims = await this.get({ ids, where });
    if (victims.length === 0) return 0;
    const collection = await this.getCollection();
    await this.run("delete", () => collection.delete({ ids: victims.map((r) => r.id) }));
    return victims.length;
  }

  async count(where?: MetadataFilter): Promise<number> {
    const collection = await this.getCollection();
    if (!toWhere(where)) return this.run("count", () => collection.count());
    const results = await this.run("count", () => collection.get({ where: toWhere(where), include: [] }));
    return results.ids.length;
  }

  async dimension(): Promise<number | null> {
    const collection = await this.getCollection();
    const results = await this.run("get", () => collection.get({ limit: 1, include: [IncludeEnum.Embeddings] }));
    const first = results.embeddings?.[0];
    return first ? first.length : null;
  }

  async clear(): Promise<void> {
    const collection = await this.getCollection();
    const results = await this.run("get", () => collection.get({ include: [] }));
    if (results.ids.length === 0) return;
    await this.run("clear", () => collection.delete({ ids: results.ids }));
  }

  // Utility method to check ChromaDB connection
  async healthCheck(): Promise<boolean> {
    try {
      await this.client.heartbeat();
      return true;
    } catch (error) {
      console.warn(`ChromaDB health check failed at ${this.options.url}: ${getErrorMessage(error)}`);
      return false;
    }
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new StoreError(`ChromaDB ${operation} failed: ${getErrorMessage(error)}`, { cause: error });
    }
  }
}

// Chroma takes a single field per filter object; combine several with $and.
function toWhere(filter?: MetadataFilter) {
  const clauses: Array<{ photo_path: string } | { aspect_name: string }> = [];
  if (filter?.photo_path !== undefined) clauses.push({ photo_path: filter.photo_path });
  if (filter?.aspect_name !== undefined) clauses.push({ aspect_name: filter.aspect_name });
  if (clauses.length === 0) return undefined;
  if (clauses.length === 1) return clauses[0];
  return { $and: clauses };
}

function toMetadata(raw: Record<string, unknown> | null | undefined): RecordMetadata | null {
  if (!raw) return null;
  const { photo_path, aspect_name } = raw;
  if (typeof photo_path !== "string" || typeof aspect_name !== "string") return null;
  return { photo_path, aspect_name };
}
