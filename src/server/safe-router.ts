/**
 * safe-router.ts — Async-safe Express router
 *
 * Express 4 does NOT catch rejected promises from async route handlers.
 * Every handler registered through this router forwards rejections and
 * sync throws to `next(err)`, which reaches the envelope error handler.
 *
 *   const router = createSafeRouter();
 *   router.get("/api/devices", async (req, res) => { … });
 */

import { Router } from "express";
import type { Request, Response, NextFunction, RequestHandler } from "express";

export type AsyncHandler = (req: Request, res: Response, next: NextFunction) => unknown;

export interface SafeRouter {
  readonly router: Router;
  get(path: string, ...handlers: AsyncHandler[]): SafeRouter;
  post(path: string, ...handlers: AsyncHandler[]): SafeRouter;
}

/** Wrap one handler so a rejected promise or sync throw goes to `next`. */
export function wrapHandler(handler: AsyncHandler): RequestHandler {
  return (req, res, next) => {
    try {
      Promise.resolve(handler(req, res, next)).catch(next);
    } catch (err) {
      next(err);
    }
  };
}

export function createSafeRouter(): SafeRouter {
  const router = Router();
  const safe: SafeRouter = {
    router,
    get: (path, ...h) => { router.get(path, ...h.map(wrapHandler)); return safe; },
    post: (path, ...h) => { router.post(path, ...h.map(wrapHandler)); return safe; },
  };
  return safe;
}
