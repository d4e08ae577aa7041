import { Response } from "express";
import { ZodType, ZodTypeDef } from "zod";
import { BackingStoreError, NotFoundError, ValidationError } from "../domain/errors";
import { logger } from "../lib/logger";

const log = logger.child("api");

/** Parse a request part, turning schema failures into a ValidationError. */
export function parseInput<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
    throw new ValidationError(issues.join("; "));
  }
  return parsed.data;
}

/**
 * Map a failure to a status code:
 * - ValidationError: 400
 * - NotFoundError: 404
 * - BackingStoreError: 502
 * - anything else: 500
 */
export function sendError(res: Response, error: unknown, action: string): void {
  if (error instanceof ValidationError) {
    log.warn(`Rejected request to ${action}`, { reason: error.message });
    res.status(400).json({ error: error.message });
    return;
  }
  if (error instanceof NotFoundError) {
    log.warn(`Nothing found to ${action}`, { reason: error.message });
    res.status(404).json({ error: error.message });
    return;
  }

  log.error(`Failed to ${action}`, error);
  if (error instanceof BackingStoreError) {
    res.status(502).json({ error: "Spreadsheet unavailable" });
    return;
  }
  res.status(500).json({ error: `Failed to ${action}` });
}
