// backend/services/shared/middleware/core.ts
import express from "express";
import cors from "cors";
import type { RequestHandler } from "express";

const JSON_BODY_LIMIT = "2mb";

export function coreMiddleware(): RequestHandler[] {
  return [
    cors({ origin: true, credentials: true }),
    express.json({ limit: JSON_BODY_LIMIT }),
  ];
}
