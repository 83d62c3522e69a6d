import { type NextFunction, type Request, type Response } from "express";
import { ZodError } from "zod";
import { HttpError } from "../utils/httpError";
import {
  ConfigurationError,
  JobAlreadyFinishedError,
  JobNotFoundError
} from "../services/evaluation/errors";

export function notFoundHandler(_req: Request, _res: Response, next: NextFunction): void {
  next(new HttpError(404, "Route not found"));
}

function statusFor(error: Error): number | null {
  if (error instanceof HttpError) return error.statusCode;
  if (error instanceof ConfigurationError) return 400;
  if (error instanceof JobNotFoundError) return 404;
  if (error instanceof JobAlreadyFinishedError) return 409;
  return null;
}

export function errorHandler(
  error: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (error instanceof ZodError) {
    res.status(400).json({ error: error.issues.map((i) => i.message).join(", ") });
    return;
  }

  if (error instanceof SyntaxError && "body" in error) {
    res.status(400).json({ error: "Malformed JSON body" });
    return;
  }

  const status = error instanceof Error ? statusFor(error) : null;
  if (status !== null && error instanceof Error) {
    res.status(status).json({ error: error.message });
    return;
  }

  console.error(error);
  res.status(500).json({ error: "Internal server error" });
}
