import type { Request, RequestHandler, Response } from "express";

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

// Express 4 ignores returned promises, so rejections are forwarded to the error middleware here.
export const asyncRoute =
  (route: AsyncRoute): RequestHandler =>
  (req, res, next) => {
    void route(req, res).catch(next);
  };
