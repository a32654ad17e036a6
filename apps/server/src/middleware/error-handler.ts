import type { NextFunction, Request, Response } from "express";
import { ZodError } from "zod";
import { HttpError } from "../lib/errors";

const isMalformedJson = (error: unknown): boolean =>
  error instanceof SyntaxError && "type" in error && error.type === "entity.parse.failed";

export const errorHandler = (
  error: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void => {
  if (error instanceof HttpError) {
    res.status(error.statusCode).json({
      message: error.message,
      details: error.details
    });
    return;
  }

  if (error instanceof ZodError) {
    res.status(400).json({
      message: "Invalid request",
      details: error.flatten().fieldErrors
    });
    return;
  }

  if (isMalformedJson(error)) {
    res.status(400).json({
      message: "Malformed JSON body"
    });
    return;
  }

  // eslint-disable-next-line no-console
  console.error(error);
  res.status(500).json({
    message: "Internal server error"
  });
};
