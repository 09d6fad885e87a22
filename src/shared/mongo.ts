/**
 * MongoDB Connection
 * ==================
 * Shared mongoose connection for the document store.
 */

import mongoose, { type Connection } from "mongoose";

import { logger } from "./logger.js";

export async function connectMongo(uri: string): Promise<Connection> {
  const connection = mongoose.createConnection(uri);
  connection.on("error", (err: unknown) => {
    logger.error("MongoDB connection error", {
      error: err instanceof Error ? err.message : String(err),
    });
  });

  await connection.asPromise();
  logger.info("MongoDB connected", { db: connection.name });
  return connection;
}

export async function disconnectMongo(connection: Connection): Promise<void> {
  try {
    await connection.close();
  } catch (err: unknown) {
    logger.warn("MongoDB close failed", {
      error: err instanceof Error ? err.message : String(err),
    });
  }
}
