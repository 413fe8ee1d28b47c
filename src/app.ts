import express from "express";
import { createCorsMiddleware } from "./middleware/cors";
import { jsonErrorHandler, notFoundHandler } from "./middleware/errorHandler";
import initRoutes from "./routers";
import type { RagAvailability } from "./routers/apiRouters";

export interface AppOptions {
  allowedOrigins?: string[];
}

export const createApp = (rag: RagAvailability, options: AppOptions = {}) => {
  const app = express();

  app.use(express.json({ limit: "32kb" }));
  app.use(createCorsMiddleware(options.allowedOrigins ?? []));
  app.use("/api", initRoutes(rag));
  app.use(notFoundHandler);
  app.use(jsonErrorHandler);

  return app;
};
