// backend/services/shared/http/errors.ts
/**
 * Transport-agnostic error primitives.
 *
 * Domain code throws a ServiceError subclass; the Express error funnel
 * (middleware/problemJson.ts) is the only place that turns it into a response.
 * Undefined members are dropped by res.json(), so they never reach the wire.
 */

export type ProblemJson = {
  type: string;
  title: string;
  status: number;
  code?: string;
  detail?: string;
  instance?: string;
  errors?: unknown;
};

export class ServiceError extends Error {
  public readonly status: number;
  public readonly code: string;
  public readonly title: string;
  public readonly extras: Record<string, unknown>;

  public constructor(opts: {
    status: number;
    code: string;
    title: string;
    detail: string;
    extras?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super(opts.detail, { cause: opts.cause });
    this.name = new.target.name;
    this.status = opts.status;
    this.code = opts.code;
    this.title = opts.title;
    this.extras = opts.extras ?? {};
  }

  public toProblem(instance?: string): ProblemJson {
    return {
      type: "about:blank",
      title: this.title,
      status: this.status,
      code: this.code,
      detail: this.message,
      instance,
      ...this.extras,
    };
  }
}

export function internalErrorProblem(instance?: string): ProblemJson {
  return {
    type: "about:blank",
    title: "Internal Server Error",
    status: 500,
    code: "INTERNAL_ERROR",
    detail: "An unexpected error occurred.",
    instance,
  };
}
