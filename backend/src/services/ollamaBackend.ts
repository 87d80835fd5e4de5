import fetch from "node-fetch";
import { z } from "zod";
import { ProviderError, getErrorMessage } from "../errors";
import type { ModelBackend } from "./embeddings";

export type OllamaOptions = {
  host: string;
  model: string;
  embeddingModel: string;
  timeoutMs: number;
};

const GenerateChunkSchema = z.object({
  response: z.string().default(""),
  done: z.boolean().default(false),
  error: z.string().optional(),
});

const EmbeddingSchema = z.object({
  embedding: z.array(z.number()),
});

const TagsSchema = z.object({
  models: z.array(z.object({ name: z.string() })),
});

/** Client for the Ollama HTTP API. */
export class OllamaBackend implements ModelBackend {
  readonly name = "ollama";

  constructor(private readonly options: OllamaOptions) {}

  async generate({ prompt, imageBase64 }: { prompt: string; imageBase64: string }): Promise<string> {
    const body = await this.request("/api/generate", {
      model: this.options.model,
      prompt,
      images: [imageBase64],
      stream: true,
    });

    // The reply is newline-delimited JSON; concatenate chunks until `done`.
    let text = "";
    for (const line of body.split("\n")) {
      if (line.trim().length === 0) continue;
      const chunk = GenerateChunkSchema.safeParse(parseJson(line, "/api/generate"));
      if (!chunk.success) {
        throw new ProviderError(`Malformed chunk from /api/generate: ${chunk.error.message}`);
      }
      if (chunk.data.error) {
        throw new ProviderError(`ollama generate failed: ${chunk.data.error}`);
      }
      text += chunk.data.response;
      if (chunk.data.done) break;
    }
    return text;
  }

  async embed(text: string): Promise<number[]> {
    const body = await this.request("/api/embeddings", {
      model: this.options.embeddingModel,
      prompt: text,
    });
    const parsed = EmbeddingSchema.safeParse(parseJson(body, "/api/embeddings"));
    if (!parsed.success) {
      throw new ProviderError(`Malformed response from /api/embeddings: ${parsed.error.message}`);
    }
    return parsed.data.embedding;
  }

  async listModels(): Promise<string[]> {
    const body = await this.request("/api/tags");
    const parsed = TagsSchema.safeParse(parseJson(body, "/api/tags"));
    if (!parsed.success) {
      throw new ProviderError(`Malformed response from /api/tags: ${parsed.error.message}`);
    }
    return parsed.data.models.map((m) => m.name);
  }

  private async request(path: string, payload?: Record<string, unknown>): Promise<string> {
    const url = `${this.options.host}${path}`;
    let status: number;
    let statusText: string;
    let ok: boolean;
    let text: string;
    try {
      const response = await fetch(url, {
        method: payload ? "POST" : "GET",
        headers: { "Content-Type": "application/json" },
        body: payload ? JSON.stringify(payload) : undefined,
        timeout: this.options.timeoutMs,
      });
      ({ status, statusText, ok } = response);
      text = await response.text();
    } catch (error) {
      throw new ProviderError(`Request to ${url} failed: ${getErrorMessage(error)}`, { cause: error });
    }
    if (!ok) {
      throw new ProviderError(`${url} responded ${status} ${statusText}: ${text.slice(0, 200)}`);
    }
    return text;
  }
}

function parseJson(text: string, path: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new ProviderError(`Invalid JSON from ${path}: ${text.slice(0, 200)}`);
  }
}
