import { createApp } from "./app";
import { loadConfig, loadEnvFile } from "./config";
import { getErrorMessage } from "./errors";
import { createPhotoSearchService } from "./services/photoSearch";

async function main(): Promise<void> {
  loadEnvFile();
  const config = loadConfig();
  const service = await createPhotoSearchService(config);
  const app = createApp(service);

  app.listen(config.port, () => {
    console.log(`Server listening on http://localhost:${config.port} (provider: ${config.provider}, model: ${config.model})`);
  });
}

main().catch((error: unknown) => {
  console.error("❌ Failed to start server:", getErrorMessage(error));
  process.exit(1);
});
