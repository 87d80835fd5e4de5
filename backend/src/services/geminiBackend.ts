import { GoogleGenerativeAI } from "@google/generative-ai";
import fetch from "node-fetch";
import { z } from "zod";
import { ProviderError, getErrorMessage } from "../errors";
import type { ModelBackend } from "./embeddings";

const MODELS_URL = "https://generativelanguage.googleapis.com/v1beta/models";

export type GeminiOptions = {
  apiKey: string;
  model: string;
  embeddingModel: string;
  timeoutMs: number;
};

const ModelListSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

export class GeminiBackend implements ModelBackend {
  readonly name = "gemini";
  private client: GoogleGenerativeAI | null = null;

  constructor(private readonly options: GeminiOptions) {}

  // Lazy init client
  private getClient(): GoogleGenerativeAI {
    if (!this.client) this.client = new GoogleGenerativeAI(this.options.apiKey);
    return this.client;
  }

  async generate({ prompt, imageBase64 }: { prompt: string; imageBase64: string }): Promise<string> {
    const model = this.getClient().getGenerativeModel(
      { model: this.options.model, generationConfig: { temperature: 0.2 } },
      { timeout: this.options.timeoutMs }
    );
    const result = await model.generateContent([
      prompt,
      { inlineData: { data: imageBase64, mimeType: "image/png" } },
    ]);
    return result.response.text();
  }

  async embed(text: string): Promise<number[]> {
    const model = this.getClient().getGenerativeModel(
      { model: this.options.embeddingModel },
      { timeout: this.options.timeoutMs }
    );
    const res = await model.embedContent(text);
    const values = res.embedding?.values;
    if (!Array.isArray(values)) throw new ProviderError("Embedding response missing values");
    return values;
  }

  async listModels(): Promise<string[]> {
    let body: unknown;
    try {
      const response = await fetch(`${MODELS_URL}?key=${encodeURIComponent(this.options.apiKey)}`, {
        timeout: this.options.timeoutMs,
      });
      if (!response.ok) {
        throw new ProviderError(`Gemini model listing responded ${response.status} ${response.statusText}`);
      }
      body = await response.json();
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      throw new ProviderError(`Gemini model listing failed: ${getErrorMessage(error)}`, { cause: error });
    }
    const parsed = ModelListSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderError(`Malformed model list: ${parsed.error.message}`);
    }
    return parsed.data.models.map((m) => m.name.replace(/^models\//, ""));
  }
}
