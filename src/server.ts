#!/usr/bin/env node
import express, { NextFunction, Request, Response } from "express";
import { getPort, isApiUrlConfigured } from "./config/constants";
import { AppContext, createContext } from "./context";
import { createRouter } from "./routes";
import { HttpRecognitionTransport } from "./services/recognitionClient";
import { sendErrorResponse } from "./utils/responseHelpers";

export const createApp = (ctx: AppContext): express.Express => {
  const app = express();

  // Request logging middleware
  app.use((req, res, next) => {
    const start = Date.now();

    // Log when response is finished
    res.on("finish", () => {
      const duration = Date.now() - start;
      const statusColor = res.statusCode >= 500 ? "\x1b[31m" : // Red for 5xx
                         res.statusCode >= 400 ? "\x1b[33m" : // Yellow for 4xx
                         res.statusCode >= 300 ? "\x1b[36m" : // Cyan for 3xx
                         "\x1b[32m"; // Green for 2xx
      const reset = "\x1b[0m";

      console.log(
        `${req.method} ${req.originalUrl} ${statusColor}${res.statusCode}${reset} ${duration}ms`
      );
    });

    next();
  });

  app.use(express.json({ limit: "1mb" }));
  app.use("/api", createRouter(ctx));

  // Upload and body-parser failures end up here
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    sendErrorResponse(res, err);
  });

  return app;
};

const start = async (): Promise<void> => {
  const { RetinaFaceLocator } = await import("./services/faceLocator");
  const locator = new RetinaFaceLocator();
  await locator.init();

  if (!isApiUrlConfigured()) {
    console.warn("API_URL is not set; recognition requests will fail until it is configured");
  }

  const ctx = createContext({ locator, transport: new HttpRecognitionTransport() });
  const app = createApp(ctx);
  const port = getPort();
  const server = app.listen(port, () => console.log(`Server running on port ${port}`));

  const shutdown = (): void => {
    ctx.stream
      .stop()
      .catch((err: unknown) => console.error("Failed to stop camera stream:", err))
      .finally(() => server.close(() => process.exit(0)));
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
};

// Only start server if this file is run directly (not imported for testing)
if (require.main === module) {
  start().catch((err: unknown) => {
    console.error("Failed to start server:", err);
    process.exit(1);
  });
}
