// src/utils/errors.ts
import type { ErrorRequestHandler } from "express";
import { ZodError } from "zod";

export type HttpError = {
  status: number;
  body: { error: string; detail?: string; issues?: unknown };
};

/** A rule the service enforces before the database would see the write. */
export class DomainError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly status = 400
  ) {
    super(message);
    this.name = "DomainError";
  }
}

// SQLSTATE codes the schema can raise
const PG_ERRORS: Record<string, { status: number; error: string }> = {
  "23505": { status: 409, error: "conflict" },
  "23502": { status: 400, error: "missing_field" },
  "23503": { status: 400, error: "invalid_reference" },
  "23514": { status: 400, error: "check_violation" },
  "22007": { status: 400, error: "invalid_date" },
  "22008": { status: 400, error: "invalid_date" },
};

function field(err: unknown, key: string): unknown {
  if (typeof err !== "object" || err === null || !(key in err)) return undefined;
  return Reflect.get(err, key);
}

/** SQLSTATE of a node-postgres / PGlite error, looking through `cause`. */
export function pgErrorCode(err: unknown): string | undefined {
  const code = field(err, "code");
  if (typeof code === "string" && /^[0-9A-Z]{5}$/.test(code)) return code;
  const cause = field(err, "cause");
  return cause === undefined ? undefined : pgErrorCode(cause);
}

export function toHttpError(err: unknown): HttpError {
  if (err instanceof ZodError) {
    return { status: 400, body: { error: "invalid_input", issues: err.issues } };
  }
  if (err instanceof DomainError) {
    return { status: err.status, body: { error: err.code, detail: err.message } };
  }
  const code = pgErrorCode(err);
  const mapped = code ? PG_ERRORS[code] : undefined;
  if (mapped) {
    const detail = field(err, "detail") ?? field(err, "message");
    return {
      status: mapped.status,
      body: { error: mapped.error, detail: typeof detail === "string" ? detail : undefined },
    };
  }
  return { status: 500, body: { error: "internal_error" } };
}

export const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  const { status, body } = toHttpError(err);
  if (status >= 500) console.error("[api] unhandled error", err);
  res.status(status).json(body);
};
