// backend/services/shared/contracts/common.ts
import { z } from "zod";
import type { Response } from "express";

/** Mongo ObjectId (24 hex chars) */
export const OBJECT_ID_RE = /^[a-f0-9]{24}$/i;
export const zObjectIdHex = z
  .string()
  .regex(OBJECT_ID_RE, "Expected 24-hex Mongo ObjectId");

/** ISO 8601 UTC with millisecond precision, as produced by Date#toISOString */
export const zIsoUtcMillis = z
  .string()
  .regex(
    /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/,
    "Expected ISO 8601 UTC timestamp with milliseconds"
  );

/** RFC 7807 Problem+JSON */
export const zProblem = z.object({
  type: z.string().default("about:blank"),
  title: z.string(),
  status: z.number().int(),
  detail: z.string().optional(),
  instance: z.string().optional(),
  code: z.string().optional(),
  errors: z.record(z.array(z.string())).optional(),
});
export type Problem = z.infer<typeof zProblem>;

/** Output guard: validate payload before sending */
export function respond<T extends z.ZodTypeAny>(
  res: Response,
  schema: T,
  payload: z.input<T>,
  status = 200
): void {
  const out: z.output<T> = schema.parse(payload);
  res.status(status).json(out);
}
