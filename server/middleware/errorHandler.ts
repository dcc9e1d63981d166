import type { ErrorRequestHandler } from "express";
import { isHttpError, ValidationError } from "../errors";
import { logger } from "../logger";

/** body-parser attaches a `type` to the errors it raises. */
function isBodyParserError(error: unknown): error is { type: string; status: number; message: string } {
  return typeof error === "object"
    && error !== null
    && "type" in error
    && typeof error.type === "string"
    && "status" in error
    && typeof error.status === "number";
}

export const errorHandler: ErrorRequestHandler = (err, req, res, next) => {
  if (res.headersSent) {
    return next(err);
  }

  if (isHttpError(err)) {
    if (err.status >= 500) {
      logger.error(`[API] ${err.name} on ${req.method} ${req.path}`, err);
    }
    res.set(err.headers).status(err.status).json(err.toJSON());
    return;
  }

  if (isBodyParserError(err)) {
    if (err.type === "entity.parse.failed") {
      const invalid = new ValidationError("Malformed JSON body", [{ path: "body", message: "Malformed JSON body" }]);
      res.status(invalid.status).json(invalid.toJSON());
      return;
    }
    if (err.status < 500) {
      res.status(err.status).json({ message: err.message });
      return;
    }
  }

  logger.error(`[API] Unhandled error on ${req.method} ${req.path}`, err);
  res.status(500).json({ message: "Internal server error" });
};
