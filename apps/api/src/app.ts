import express from "express";
import cors from "cors";
import { health } from "./routes/health.js";
import { admin } from "./routes/admin.js";
import { defaults } from "./routes/defaults.js";
import { tools } from "./routes/tools.js";
import { emissions } from "./routes/emissions.js";
import { multiStream } from "./routes/multiStream.js";
import { errorHandler } from "./util/errorHandler.js";

export function createApp() {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "2mb" }));

  app.use("/health", health);
  app.use("/admin", admin);
  app.use("/defaults", defaults);
  app.use("/tools", tools);
  app.use("/emissions", emissions);
  app.use("/multi-stream", multiStream);

  app.use(errorHandler);
  return app;
}
