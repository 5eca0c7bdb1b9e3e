// src/db/mongo.ts

import mongoose from "mongoose";
import { describeError, logEvent } from "../utils/logger";

export async function connectMongo(): Promise<void> {
  const uri = process.env.MONGO_URI;
  if (!uri) {
    logEvent("error", "mongo_uri_missing");
    process.exit(1);
  }

  try {
    await mongoose.connect(uri);
    logEvent("info", "mongo_connected");
  } catch (err) {
    logEvent("error", "mongo_connection_failed", { error: describeError(err) });
    process.exit(1);
  }
}
