import type { ErrorResponse } from "@payscan/contracts";
import type { Request, Response } from "express";
import type { ZodType } from "zod";

export function sendError(res: Response, status: number, payload: ErrorResponse): void {
  res.status(status).json(payload);
}

export function parseBody<T>(
  schema: ZodType<T>,
  req: Request,
  res: Response,
): T | null {
  const result = schema.safeParse(req.body);
  if (!result.success) {
    sendError(res, 400, {
      error: "invalid_request",
      issues: result.error.issues.map((issue) => ({
        path: issue.path.map((key) => (typeof key === "symbol" ? String(key) : key)),
        message: issue.message,
      })),
    });
    return null;
  }
  return result.data;
}

/** Body-parser failures carry a `type` such as `entity.parse.failed`. */
export function bodyParserErrorType(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "type" in error) {
    return typeof error.type === "string" ? error.type : undefined;
  }
  return undefined;
}
