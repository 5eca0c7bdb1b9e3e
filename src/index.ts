// src/index.ts
// service entry file

import "dotenv/config";
import express from "express";
import cors from "cors";
import { connectMongo } from "./db/mongo";
import hintRoutes from "./routes/hints";
import problemRoutes from "./routes/problems";
import progressRoutes from "./routes/progress";
import { requestContextMiddleware } from "./middleware/requestContext";
import { errorHandler } from "./middleware/errorHandler";
import { sendError } from "./http/sendError";
import { refreshSimilarityIndex } from "./services/hintRuntime";
import { describeError, logEvent } from "./utils/logger";

const PORT = process.env.PORT || 3000;

const app = express();

app.use(
  cors({
    origin: "*",
    methods: ["GET", "POST"],
  })
);

// body size limit
app.use(express.json({ limit: "1mb" }));

app.use(requestContextMiddleware);

app.get("/health", (_req, res) => res.status(200).json({ status: "ok" }));

app.use("/hints", hintRoutes);
app.use("/problems", problemRoutes);
app.use("/progress", progressRoutes);

// 404
app.use((_req, res) => sendError(res, 404, "Not Found", "NOT_FOUND"));

app.use(errorHandler);

async function start(): Promise<void> {
  await connectMongo();
  const indexed = await refreshSimilarityIndex();
  logEvent("info", "similarity_index_ready", { problems: indexed });

  app.listen(PORT, () => {
    logEvent("info", "server_listening", { port: Number(PORT) });
  });
}

start().catch((err) => {
  logEvent("error", "startup_failed", { error: describeError(err) });
  process.exit(1);
});
