/**
 * Resourceful API Server
 *
 * Fastify entry point. Boots the platform, registers routes, starts listening.
 */

import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
dotenv.config({ path: path.resolve(__dirname, "../../../.env") });
import { captureException, createLogger, flushObservability } from "@resourceful/platform";
import { bootstrap } from "./bootstrap.js";
import { buildServer } from "./server.js";

const logger = createLogger("server");

async function main() {
  // 1. Bootstrap platform + domain
  const application = bootstrap();
  const { config } = application;

  // 2. Build the HTTP server
  const app = await buildServer(application);

  // 3. Start server
  await app.listen({
    port: config.api.port,
    host: config.api.host,
  });

  logger.info("API listening", {
    url: `http://localhost:${config.api.port}${config.api.prefix}`,
    resources: application.api.resourceNames(),
  });

  // 4. Graceful shutdown
  const shutdown = async () => {
    logger.info("Shutting down");
    await app.close();
    await flushObservability(2000);
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

main().catch(async (err: unknown) => {
  logger.error("Fatal error", { error: err instanceof Error ? err.message : String(err) });
  captureException(err instanceof Error ? err : new Error(String(err)));
  await flushObservability(2000);
  process.exit(1);
});
