import { Router, type NextFunction, type Request, type Response } from "express";
import type { SessionManager } from "../session.js";
import { ChatMessageSchema, InitRequestSchema, parseBody } from "./schemas.js";

export interface BridgeHandlers {
  init(req: Request, res: Response, next: NextFunction): Promise<void>;
  chat(req: Request, res: Response, next: NextFunction): Promise<void>;
  stop(req: Request, res: Response): void;
}

export function createBridgeHandlers(sessions: SessionManager): BridgeHandlers {
  return {
    // POST /api/init { pretty? }
    async init(req, res, next) {
      try {
        const { pretty } = parseBody(InitRequestSchema, req.body);
        res.json(await sessions.initialize({ pretty }));
      } catch (err: unknown) {
        next(err);
      }
    },

    // POST /api/chat { content }
    async chat(req, res, next) {
      try {
        const { content } = parseBody(ChatMessageSchema, req.body);
        res.json(await sessions.dispatch(content));
      } catch (err: unknown) {
        next(err);
      }
    },

    // POST /api/stop
    stop(_req, res) {
      res.json(sessions.stop());
    },
  };
}

export function createBridgeRouter(sessions: SessionManager): Router {
  const router = Router();
  const handlers = createBridgeHandlers(sessions);
  router.post("/init", handlers.init);
  router.post("/chat", handlers.chat);
  router.post("/stop", handlers.stop);
  return router;
}
