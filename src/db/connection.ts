// src/db/connection.ts
import mongoose from "mongoose";
import { env } from "../config/env";
import { logger } from "../utils/logger";

export async function connectDB(uri: string = env.MONGODB_URI) {
  await mongoose.connect(uri);
  logger.info("Connected to MongoDB via mongoose");
}

export async function disconnectDB() {
  await mongoose.disconnect();
  logger.info("MongoDB disconnected");
}
