// backend/services/shared/middleware/problemJson.ts
/**
 * RFC 7807 Problem+JSON formatting for every error response.
 *
 * Notes:
 * - Transport-level formatting only; the error taxonomy lives with the domain
 *   (ServiceError subclasses).
 * - 404s are formatted only under known prefixes; everything else gets a bare 404.
 * - Unexpected errors are logged with their stack and answered with a generic
 *   500 body that carries no internals.
 */

import { STATUS_CODES } from "node:http";
import type { ErrorRequestHandler, Request, RequestHandler } from "express";
import {
  ServiceError,
  internalErrorProblem,
  type ProblemJson,
} from "../http/errors";
import { extractLogContext, logger } from "../utils/logger";

const PROBLEM_CONTENT_TYPE = "application/problem+json";

function requestInstance(req: Request): string | undefined {
  return req.id === undefined ? undefined : String(req.id);
}

/** Client-side errors raised by body-parser and friends carry a numeric status. */
function clientErrorStatus(err: unknown): number | null {
  if (!err || typeof err !== "object") return null;
  const raw =
    "status" in err ? err.status : "statusCode" in err ? err.statusCode : null;
  const n = typeof raw === "number" ? Math.trunc(raw) : NaN;
  return n >= 400 && n < 500 ? n : null;
}

/** "Payload Too Large" -> "PAYLOAD_TOO_LARGE" */
function codeFromTitle(title: string): string {
  return title.toUpperCase().replace(/[^A-Z0-9]+/g, "_");
}

function underPrefix(path: string, prefix: string): boolean {
  return path === prefix || path.startsWith(`${prefix}/`);
}

export function notFoundProblemJson(validPrefixes: string[]): RequestHandler {
  return (req, res) => {
    if (validPrefixes.some((p) => underPrefix(req.path, p))) {
      const body: ProblemJson = {
        type: "about:blank",
        title: "Not Found",
        status: 404,
        code: "NOT_FOUND",
        detail: "Route not found",
        instance: requestInstance(req),
      };
      res.status(404).type(PROBLEM_CONTENT_TYPE).json(body);
      return;
    }
    res.status(404).end();
  };
}

export function errorProblemJson(): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    const instance = requestInstance(req);
    const ctx = extractLogContext(req);

    if (err instanceof ServiceError) {
      const problem = err.toProblem(instance);
      if (err.status >= 500) {
        logger.error({ ...ctx, code: err.code, err }, "request failed");
      } else {
        logger.debug({ ...ctx, code: err.code }, "request rejected");
      }
      res.status(err.status).type(PROBLEM_CONTENT_TYPE).json(problem);
      return;
    }

    const status = clientErrorStatus(err);
    if (status !== null) {
      const title = STATUS_CODES[status] ?? "Client Error";
      const body: ProblemJson = {
        type: "about:blank",
        title,
        status,
        code: codeFromTitle(title),
        detail: err instanceof Error ? err.message : "Malformed request",
        instance,
      };
      res.status(status).type(PROBLEM_CONTENT_TYPE).json(body);
      return;
    }

    logger.error({ ...ctx, err }, "unhandled error in request pipeline");
    res.status(500).type(PROBLEM_CONTENT_TYPE).json(internalErrorProblem(instance));
  };
}
