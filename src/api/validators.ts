import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { z } from "zod";

/**
 * Parses `{ body, query, params }` against `schema` and hands the typed
 * result to `handler`. Invalid requests get a 400 without reaching it.
 */
export function validate<S extends z.ZodTypeAny>(
  schema: S,
  handler: (input: z.infer<S>, req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse({
      body: req.body,
      query: req.query,
      params: req.params,
    });
    if (!result.success) {
      res.status(400).json({ error: result.error.issues.map((i) => i.message).join("; ") });
      return;
    }
    handler(result.data, req, res).catch(next);
  };
}

export function asyncRoute(
  handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}
