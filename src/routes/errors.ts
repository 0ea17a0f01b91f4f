import type { ErrorRequestHandler } from "express";
import {
  HTTP_STATUS_BY_CATEGORY,
  InvalidInputError,
  NotFoundError,
  TransferError,
  toTransferError,
  type ErrorCategory,
  type NotFoundReason,
} from "../utils/errors";

/** Body of every non-2xx JSON response. */
export interface ErrorResponse {
  error: ErrorCategory;
  detail: string;
  reason?: NotFoundReason;
}

// body-parser tags its failures with `type` and an HTTP `status`
function bodyParserFailure(error: unknown): { status: number; message: string } | null {
  if (
    error instanceof Error &&
    "type" in error &&
    typeof error.type === "string" &&
    "status" in error &&
    typeof error.status === "number"
  ) {
    return { status: error.status, message: error.message };
  }
  return null;
}

export function errorBody(error: TransferError): ErrorResponse {
  const body: ErrorResponse = { error: error.category, detail: error.message };
  if (error instanceof NotFoundError) body.reason = error.reason;
  return body;
}

export const errorHandler: ErrorRequestHandler = (error, req, res, next) => {
  if (res.headersSent) {
    next(error);
    return;
  }

  const parserFailure = bodyParserFailure(error);
  if (parserFailure) {
    const body = errorBody(new InvalidInputError(parserFailure.message));
    res.status(parserFailure.status).json(body);
    return;
  }

  const normalized = toTransferError(error, `${req.method} ${req.path} failed`);
  const status = HTTP_STATUS_BY_CATEGORY[normalized.category];
  if (status >= 500) {
    console.error(`Error handling ${req.method} ${req.path}:`, error);
  }
  res.status(status).json(errorBody(normalized));
};
