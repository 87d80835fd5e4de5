import type { AppConfig } from "../config";
import { StoreError } from "../errors";
import { ChromaVectorStore } from "./chromaVectorStore";
import { InMemoryVectorStore } from "./inMemoryVectorStore";
import type { VectorStore } from "./vectorStore";

/**
 * Picks the backend once, when the store is opened. With `auto`, ChromaDB is
 * used if its server answers a heartbeat, otherwise the local JSON-backed
 * store. The choice never changes afterwards; later backend failures surface
 * as StoreError.
 */
export async function openVectorStore(
  config: Pick<AppConfig, "vectorStore" | "chromaUrl" | "collectionName" | "storageDir">
): Promise<VectorStore> {
  const local = () => new InMemoryVectorStore({ name: config.collectionName, storageDir: config.storageDir });

  if (config.vectorStore === "local") return local();

  console.log("Testing ChromaDB connection...");
  const chroma = new ChromaVectorStore({ url: config.chromaUrl, collectionName: config.collectionName });
  const isHealthy = await chroma.healthCheck();

  if (isHealthy) {
    console.log("✅ ChromaDB is available - using persistent storage");
    return chroma;
  }
  if (config.vectorStore === "chroma") {
    throw new StoreError(`ChromaDB is not reachable at ${config.chromaUrl}`);
  }
  console.warn(`⚠️ ChromaDB not available - falling back to local storage in ${config.storageDir}`);
  return local();
}
