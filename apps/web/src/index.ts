import { createApp } from "./app.js";
import { env } from "./config/env.js";
import { connectDatabase, disconnectDatabase } from "./db/connect.js";
import { logger } from "./utils/logger.js";

await connectDatabase();

const app = createApp();
const server = app.listen(env.PORT, () => {
  logger.info("web server listening", { url: `http://localhost:${env.PORT}` });
});

function shutdown(signal: string) {
  logger.info("shutting down", { signal });
  server.close(() => {
    disconnectDatabase()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error("database disconnect failed", { error: String(error) });
        process.exit(1);
      });
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
