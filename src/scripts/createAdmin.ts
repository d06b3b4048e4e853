// src/scripts/createAdmin.ts
import { env } from "../config/env";
import { logger } from "../utils/logger";
import { connectDB, disconnectDB } from "../db/connection";
import { createMongoStore } from "../store";
import { createAuthService } from "../modules/Auths/authService";

async function createAdmin() {
  const { ADMIN_USERNAME, ADMIN_EMAIL, ADMIN_PASSWORD } = env;
  if (!ADMIN_USERNAME || !ADMIN_EMAIL || !ADMIN_PASSWORD) {
    throw new Error("ADMIN_USERNAME, ADMIN_EMAIL and ADMIN_PASSWORD must be set");
  }

  await connectDB();
  try {
    const authService = createAuthService({ store: createMongoStore() });
    const { created } = await authService.ensureAdmin({
      username: ADMIN_USERNAME,
      email: ADMIN_EMAIL,
      password: ADMIN_PASSWORD,
    });
    logger.info(created ? "Superuser created successfully!" : "Superuser already exists.");
  } finally {
    await disconnectDB();
  }
}

createAdmin().catch((err: unknown) => {
  logger.fatal({ err }, "create-admin failed");
  process.exit(1);
});
