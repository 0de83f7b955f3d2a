import express, { type ErrorRequestHandler, type Express } from "express";
import cors from "cors";
import { createAuthMiddleware } from "./auth-middleware.js";
import type { AutomationDeps } from "./automation.js";
import { RelayError, errorMessage } from "./errors.js";
import { createAgentRouter } from "./routes/agent.js";
import { createBridgeRouter } from "./routes/bridge.js";

export const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  if (err instanceof RelayError) {
    res.status(err.status).json({ error: err.message });
    return;
  }
  // express.json() rejects malformed bodies with a SyntaxError
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: "Invalid JSON body" });
    return;
  }
  console.error("[server] unhandled route error:", err);
  res.status(500).json({ error: errorMessage(err) });
};

export function createApp(deps: AutomationDeps): Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  // Health check (no auth)
  app.get("/health", (_req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  app.use("/api", createAuthMiddleware(deps.config.sharedSecret));
  app.use("/api", createBridgeRouter(deps.sessions));
  app.use("/api/agent", createAgentRouter(deps));
  app.use(errorHandler);

  return app;
}
