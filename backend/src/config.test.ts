import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";
import { ValidationError } from "./errors";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      provider: "ollama",
      ollamaHost: "http://localhost:11434",
      model: "llava-phi3:latest",
      embeddingModel: "llava-phi3:latest",
      googleApiKey: undefined,
      requestTimeoutMs: 120000,
      concurrency: 4,
      vectorStore: "auto",
      chromaUrl: "http://localhost:8000",
      collectionName: "photo_collection",
      storageDir: ".vector_storage",
      port: 3001,
    });
  });

  it("reads and coerces explicit values", () => {
    const config = loadConfig({
      OLLAMA_HOST: "http://gpu-box:11434/",
      MODEL: "llava:7b",
      EMBEDDING_MODEL: "nomic-embed-text",
      INDEX_CONCURRENCY: "8",
      REQUEST_TIMEOUT_MS: "3000",
      VECTOR_STORE: "local",
      PORT: "8080",
    });

    expect(config).toMatchObject({
      ollamaHost: "http://gpu-box:11434",
      model: "llava:7b",
      embeddingModel: "nomic-embed-text",
      concurrency: 8,
      requestTimeoutMs: 3000,
      vectorStore: "local",
      port: 8080,
    });
  });

  it("uses Gemini model defaults for the gemini provider", () => {
    const config = loadConfig({ PROVIDER: "gemini", GOOGLE_API_KEY: "test-key" });
    expect(config).toMatchObject({
      provider: "gemini",
      model: "gemini-1.5-flash",
      embeddingModel: "text-embedding-004",
      googleApiKey: "test-key",
    });
  });

  it("requires an API key for the gemini provider", () => {
    expect(() => loadConfig({ PROVIDER: "gemini" })).toThrow(
      "Invalid configuration: GOOGLE_API_KEY: GOOGLE_API_KEY is required when PROVIDER=gemini"
    );
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ INDEX_CONCURRENCY: "0" })).toThrow(ValidationError);
    expect(() => loadConfig({ VECTOR_STORE: "redis" })).toThrow(ValidationError);
    expect(() => loadConfig({ COLLECTION_NAME: "x" })).toThrow(ValidationError);
  });
});
