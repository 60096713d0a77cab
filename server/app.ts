import { type Server, createServer } from "node:http";

import express, {
  type Express,
  type Request,
  type Response,
  type NextFunction,
} from "express";

import { getEnvConfig, validateEnv } from "./config/env";
import { createGeminiWorkflow } from "./gemini-client";
import { logInfo, logError } from "./utils/logger";
import type { Workflow } from "./workflow";
import { registerWorkflowRoutes } from "./workflow/workflowRoute";

const APP_VERSION = process.env.npm_package_version ?? "1.0.0";

function statusOf(err: unknown): number {
  const status: unknown = typeof err === "object" && err !== null
    ? Reflect.get(err, "status") ?? Reflect.get(err, "statusCode")
    : undefined;
  return typeof status === "number" ? status : 500;
}

export function createApp(workflow: Workflow): Express {
  const app = express();

  app.use(express.json());

  // Request logging middleware
  app.use((req, res, next) => {
    const start = Date.now();
    const reqPath = req.path;

    res.on("finish", () => {
      if (reqPath.startsWith("/api")) {
        logInfo("api_request", {
          method: req.method,
          path: reqPath,
          statusCode: res.statusCode,
          durationMs: Date.now() - start,
        });
      }
    });

    next();
  });

  registerWorkflowRoutes(app, workflow, APP_VERSION);

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    const message = err instanceof Error ? err.message : "Internal Server Error";

    // Log the error but don't throw it - that causes connection issues
    logError("server_error", {
      statusCode: status,
      message,
      stack: err instanceof Error ? err.stack : undefined,
    });
    res.status(status).json({ success: false, message: status === 500 ? "Internal Server Error" : message });
  });

  return app;
}

export default function runApp(): Server {
  // Validate environment variables before anything else
  validateEnv();
  const env = getEnvConfig();

  const app = createApp(createGeminiWorkflow(env));
  const server = createServer(app);

  server.listen({ port: env.PORT, host: "0.0.0.0" }, () => {
    logInfo("server_started", { port: env.PORT, host: "0.0.0.0", env: env.NODE_ENV });
  });

  return server;
}
