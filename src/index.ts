// src/index.ts
import { env } from "./config/env";
import { logger } from "./utils/logger";
import { connectDB, disconnectDB } from "./db/connection";
import { createMongoStore } from "./store";
import { createApp } from "./app";

async function main() {
  await connectDB();

  const app = createApp({ store: createMongoStore() });
  const server = app.listen(env.PORT, () => {
    logger.info(`Server running on port ${env.PORT} (${env.NODE_ENV})`);
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`${signal} received, shutting down`);
    server.close(() => {
      disconnectDB()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, "MongoDB disconnect failed");
          process.exit(1);
        });
    });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  logger.fatal({ err }, "MongoDB connection error");
  process.exit(1);
});
