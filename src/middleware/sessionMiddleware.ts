import { Request, Response, NextFunction } from "express";
import { ReportStore } from "../db/memoryStore.js";

declare global {
  namespace Express {
    interface Request {
      sessionId?: string;
    }
  }
}

export const SESSION_HEADER = "x-session-id";

/**
 * Resolves the caller's session from the x-session-id header.
 * Only ids the store knows are attached; sessions are created by the
 * processing endpoint, never by reads.
 */
export function sessionMiddleware(store: ReportStore) {
  return (req: Request, res: Response, next: NextFunction) => {
    const requested = req.header(SESSION_HEADER);

    if (requested && store.has(requested)) {
      req.sessionId = requested;
      res.setHeader(SESSION_HEADER, requested);
    }

    next();
  };
}
