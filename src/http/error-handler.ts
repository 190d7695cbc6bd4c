/**
 * Express 错误处理：请求校验失败 400，其余 500，不会导致进程退出
 */

import type { NextFunction, Request, Response } from "express";
import { ZodError } from "zod";
import { errorMessage } from "../errors.js";
import { formatZodIssues } from "../store/loader.js";
import { createChildLogger } from "../logger.js";

const log = createChildLogger("http:error-handler");

interface ErrorResponse {
  readonly ok: false;
  readonly error: string;
  readonly message: string;
  readonly details?: readonly string[];
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof ZodError) {
    const body: ErrorResponse = {
      ok: false,
      error: "VALIDATION_ERROR",
      message: "Validation failed",
      details: formatZodIssues(err),
    };
    res.status(400).json(body);
    return;
  }

  // express.json() 解析失败
  if (err instanceof SyntaxError) {
    const body: ErrorResponse = { ok: false, error: "INVALID_JSON", message: "Request body is not valid JSON" };
    res.status(400).json(body);
    return;
  }

  log.error({ method: req.method, path: req.path, error: errorMessage(err) }, "Unhandled error");
  if (res.headersSent) {
    res.end();
    return;
  }
  const body: ErrorResponse = { ok: false, error: "INTERNAL_ERROR", message: "Internal server error occurred" };
  res.status(500).json(body);
}
