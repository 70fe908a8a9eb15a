import type { Response } from "express";
import type { ZodType, ZodTypeDef } from "zod";
import { HttpError } from "../utils/errors";

export interface ApiResponse<T> {
  success: boolean;
  message: string;
  data: T | null;
}

export function sendSuccess<T>(
  res: Response,
  message: string,
  data: T,
  status = 200,
): void {
  const body: ApiResponse<T> = { success: true, message, data };
  res.status(status).json(body);
}

export function sendFailure(res: Response, status: number, message: string): void {
  const body: ApiResponse<never> = { success: false, message, data: null };
  res.status(status).json(body);
}

/**
 * Validates a request body against `schema`.
 * @throws HttpError 400 carrying the first issue.
 */
export function parseBody<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  body: unknown,
): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const path = issue?.path.join(".");
    const message = issue ? issue.message : "Invalid request body";
    throw new HttpError(400, path ? `${path}: ${message}` : message);
  }
  return parsed.data;
}
