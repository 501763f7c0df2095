import { z } from "zod";

export const MAX_SYNC_LIMIT = 100;
export const MAX_STEP_DELAY_MS = 5_000;

export const symbolSchema = z
  .string()
  .regex(/^[A-Za-z0-9.-]{1,12}$/, "Symbol must be 1-12 letters, digits, dots or dashes")
  .transform((symbol) => symbol.toUpperCase());

const limitSchema = (fallback: number) =>
  z.coerce.number().int().min(1).max(MAX_SYNC_LIMIT).default(fallback);

export const periodicQuerySchema = (defaultLimit: number) =>
  z.object({
    period: z.enum(["annual", "quarter"]).default("quarter"),
    limit: limitSchema(defaultLimit),
  });

export const fullSyncQuerySchema = (defaults: {
  financialLimit: number;
  metricsLimit: number;
  stepDelayMs: number;
}) =>
  z.object({
    financialLimit: limitSchema(defaults.financialLimit),
    metricsLimit: limitSchema(defaults.metricsLimit),
    stepDelayMs: z.coerce
      .number()
      .int()
      .min(0)
      .max(MAX_STEP_DELAY_MS)
      .default(defaults.stepDelayMs),
  });

export type ValidationIssue = { path: string; message: string };

/**
 * Raised for malformed path or query input; the app error handler answers 422.
 */
export class RequestValidationError extends Error {
  constructor(readonly issues: ValidationIssue[]) {
    super("Invalid request parameters");
    this.name = "RequestValidationError";
  }
}

export const parseOrThrow = <S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  location: "path" | "query",
): z.output<S> => {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new RequestValidationError(
      parsed.error.issues.map((issue) => ({
        path: [location, ...issue.path].join("."),
        message: issue.message,
      })),
    );
  }
  return parsed.data;
};
