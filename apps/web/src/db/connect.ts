import mongoose from "mongoose";
import { env } from "../config/env.js";
import { logger } from "../utils/logger.js";

let isConnected = false;

export async function connectDatabase() {
  if (isConnected) {
    return;
  }

  await mongoose.connect(env.MONGODB_URI, {
    dbName: env.MONGODB_DB_NAME,
    serverSelectionTimeoutMS: 15000,
    family: 4
  });
  isConnected = true;
  logger.info("database connected", { dbName: env.MONGODB_DB_NAME });
}

export async function disconnectDatabase() {
  if (!isConnected) {
    return;
  }
  await mongoose.disconnect();
  isConnected = false;
}
