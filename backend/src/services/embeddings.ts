import type { AppConfig } from "../config";
import { PhotoSearchError, ProviderError, getErrorMessage } from "../errors";
import { GeminiBackend } from "./geminiBackend";
import { OllamaBackend } from "./ollamaBackend";

export const DEFAULT_DESCRIBE_PROMPT = "Describe this image in detail:";

/** Raw calls against a model-serving endpoint. */
export interface ModelBackend {
  readonly name: string;
  generate(input: { prompt: string; imageBase64: string }): Promise<string>;
  embed(text: string): Promise<number[]>;
  listModels(): Promise<string[]>;
}

export type DescribedImage = {
  description: string;
  embedding: number[];
};

/**
 * Turns images and text into descriptions and vectors. The vector of an image
 * is always the text embedding of its generated description, so image and
 * text queries land in the same space.
 */
export class EmbeddingProvider {
  constructor(private readonly backend: ModelBackend) {}

  get backendName(): string {
    return this.backend.name;
  }

  async describeAndEmbed(imageBase64: string, prompt?: string): Promise<DescribedImage> {
    const text = await this.call("generate", () =>
      this.backend.generate({ prompt: prompt?.trim() || DEFAULT_DESCRIBE_PROMPT, imageBase64 })
    );
    const description = text.trim();
    if (description.length === 0) {
      throw new ProviderError(`${this.backend.name} returned an empty description`);
    }
    const embedding = await this.embedText(description);
    return { description, embedding };
  }

  async embedText(text: string): Promise<number[]> {
    const vector = await this.call("embed", () => this.backend.embed(text));
    if (vector.length === 0) {
      throw new ProviderError(`${this.backend.name} returned an empty embedding`);
    }
    if (!vector.every((x) => Number.isFinite(x))) {
      throw new ProviderError(`${this.backend.name} returned a non-numeric embedding`);
    }
    return vector;
  }

  listModels(): Promise<string[]> {
    return this.call("list models", () => this.backend.listModels());
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof PhotoSearchError) throw error;
      throw new ProviderError(`${this.backend.name} ${operation} failed: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }
  }
}

export function createEmbeddingProvider(config: AppConfig): EmbeddingProvider {
  if (config.provider === "gemini") {
    return new EmbeddingProvider(
      new GeminiBackend({
        apiKey: config.googleApiKey ?? "",
        model: config.model,
        embeddingModel: config.embeddingModel,
        timeoutMs: config.requestTimeoutMs,
      })
    );
  }
  return new EmbeddingProvider(
    new OllamaBackend({
      host: config.ollamaHost,
      model: config.model,
      embeddingModel: config.embeddingModel,
      timeoutMs: config.requestTimeoutMs,
    })
  );
}
