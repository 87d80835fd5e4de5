import { ValidationError } from "../errors";
import type { SearchResult } from "../types";
import type { AspectIndex } from "./aspectIndex";
import type { EmbeddingProvider } from "./embeddings";
import { normalize } from "./imagePreprocessor";

export const DEFAULT_TOP_K = 5;

export type SearchOptions = {
  aspect?: string;
  k?: number;
};

export type SearchInput = SearchOptions & {
  image?: Buffer;
  text?: string;
};

export class QueryEngine {
  constructor(
    private readonly index: AspectIndex,
    private readonly provider: EmbeddingProvider
  ) {}

  async searchByImage(image: Buffer, { aspect, k = DEFAULT_TOP_K }: SearchOptions = {}): Promise<SearchResult[]> {
    const canonical = await normalize(image);
    const { embedding } = await this.provider.describeAndEmbed(canonical);
    return this.index.query(embedding, k, { aspect });
  }

  async searchByText(text: string, { aspect, k = DEFAULT_TOP_K }: SearchOptions = {}): Promise<SearchResult[]> {
    if (text.trim().length === 0) throw new ValidationError("Query text must not be empty");
    const embedding = await this.provider.embedText(text);
    return this.index.query(embedding, k, { aspect });
  }

  search({ image, text, ...options }: SearchInput): Promise<SearchResult[]> {
    if (image) return this.searchByImage(image, options);
    if (text !== undefined) return this.searchByText(text, options);
    return Promise.reject(new ValidationError("Provide either a query image or query text"));
  }
}
