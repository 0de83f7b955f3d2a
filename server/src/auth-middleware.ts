import type { Request, Response, NextFunction, RequestHandler } from "express";

/** Bearer-secret guard for /api. Open when no secret is configured. */
export function createAuthMiddleware(secret: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!secret) {
      next();
      return;
    }

    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith("Bearer ")) {
      res.status(401).json({ error: "Missing or invalid Authorization header" });
      return;
    }

    if (authHeader.slice(7) !== secret) {
      res.status(401).json({ error: "Invalid token" });
      return;
    }

    next();
  };
}
