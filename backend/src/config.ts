import dotenv from "dotenv";
import { z } from "zod";
import { ValidationError } from "./errors";

const DEFAULT_OLLAMA_MODEL = "llava-phi3:latest";
const DEFAULT_GEMINI_MODEL = "gemini-1.5-flash";
const DEFAULT_GEMINI_EMBEDDING_MODEL = "text-embedding-004";

const EnvSchema = z
  .object({
    PROVIDER: z.enum(["ollama", "gemini"]).default("ollama"),
    OLLAMA_HOST: z.string().url().default("http://localhost:11434"),
    MODEL: z.string().min(1).optional(),
    EMBEDDING_MODEL: z.string().min(1).optional(),
    GOOGLE_API_KEY: z.string().optional(),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
    INDEX_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),
    VECTOR_STORE: z.enum(["chroma", "local", "auto"]).default("auto"),
    CHROMA_URL: z.string().url().default("http://localhost:8000"),
    COLLECTION_NAME: z
      .string()
      .regex(/^[a-zA-Z0-9][a-zA-Z0-9._-]{1,61}[a-zA-Z0-9]$/, "must be 3-63 characters of letters, digits, '.', '_' or '-'")
      .default("photo_collection"),
    STORAGE_DIR: z.string().min(1).default(".vector_storage"),
    PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  })
  .refine((env) => env.PROVIDER !== "gemini" || (env.GOOGLE_API_KEY ?? "").length > 0, {
    message: "GOOGLE_API_KEY is required when PROVIDER=gemini",
    path: ["GOOGLE_API_KEY"],
  });

export type ProviderName = "ollama" | "gemini";
export type VectorStoreKind = "chroma" | "local" | "auto";

export type AppConfig = {
  provider: ProviderName;
  ollamaHost: string;
  model: string;
  embeddingModel: string;
  googleApiKey?: string;
  requestTimeoutMs: number;
  concurrency: number;
  vectorStore: VectorStoreKind;
  chromaUrl: string;
  collectionName: string;
  storageDir: string;
  port: number;
};

/**
 * Builds the configuration once at start-up. Components receive the result
 * explicitly; nothing reads process.env after this point.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ValidationError(`Invalid configuration: ${details}`);
  }
  const e = parsed.data;
  const model = e.MODEL ?? (e.PROVIDER === "gemini" ? DEFAULT_GEMINI_MODEL : DEFAULT_OLLAMA_MODEL);
  const embeddingModel = e.EMBEDDING_MODEL ?? (e.PROVIDER === "gemini" ? DEFAULT_GEMINI_EMBEDDING_MODEL : model);

  return {
    provider: e.PROVIDER,
    ollamaHost: e.OLLAMA_HOST.replace(/\/+$/, ""),
    model,
    embeddingModel,
    googleApiKey: e.GOOGLE_API_KEY || undefined,
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    concurrency: e.INDEX_CONCURRENCY,
    vectorStore: e.VECTOR_STORE,
    chromaUrl: e.CHROMA_URL,
    collectionName: e.COLLECTION_NAME,
    storageDir: e.STORAGE_DIR,
    port: e.PORT,
  };
}

export function loadEnvFile(): void {
  dotenv.config();
}
