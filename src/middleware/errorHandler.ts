import type { ErrorRequestHandler, RequestHandler } from "express";
import {
  HttpError,
  INTERNAL_ERROR_MESSAGE,
  MethodNotAllowedError,
  NotFoundError,
} from "../utils/errors";

export interface ErrorBody {
  success: false;
  error: number;
  message: string;
  details?: string[];
}

// body-parser marks its own failures (bad JSON, oversized payload) with a status
const hasClientStatus = (error: unknown): error is { status: number } =>
  typeof error === "object" &&
  error !== null &&
  "status" in error &&
  typeof error.status === "number" &&
  error.status >= 400 &&
  error.status < 500;

export const toErrorBody = (error: unknown): ErrorBody => {
  if (error instanceof HttpError) {
    return {
      success: false,
      error: error.status,
      message: error.message,
      ...(error.details ? { details: error.details } : {}),
    };
  }
  if (hasClientStatus(error)) {
    return { success: false, error: 400, message: "invalid request" };
  }
  return { success: false, error: 500, message: INTERNAL_ERROR_MESSAGE };
};

export const errorHandler: ErrorRequestHandler = (error, req, res, _next) => {
  const body = toErrorBody(error);
  if (body.error === 500) {
    console.error(`Error - [${req.method}] ${req.originalUrl}:`, error);
  }
  res.status(body.error).json(body);
};

export const methodNotAllowed: RequestHandler = (_req, _res, next) => {
  next(new MethodNotAllowedError());
};

export const routeNotFound: RequestHandler = (_req, _res, next) => {
  next(new NotFoundError());
};
