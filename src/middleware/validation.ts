import { z } from "zod";
import { Request, Response, NextFunction } from "express";

// ===== ZOD VALIDATION SCHEMAS =====

// Ethereum address validation
const ethereumAddressSchema = z
  .string()
  .regex(/^0x[a-fA-F0-9]{40}$/, "Invalid Ethereum address format");

// Wei amounts travel as decimal strings so they never lose precision
const weiAmountSchema = z
  .string()
  .regex(/^\d+$/, "Amount must be a non-negative integer (wei) as a string");

const uint256Schema = z
  .string()
  .regex(/^\d+$/, "Value must be a non-negative integer as a string")
  .refine((val) => BigInt(val) < 2n ** 256n, "Value must fit in 256 bits");

const requestIdSchema = z
  .string()
  .regex(/^\d+$/, "Request ID must be a non-negative integer as a string");

const hexDataSchema = z
  .string()
  .regex(/^0x([a-fA-F0-9]{2})*$/, "performData must be 0x-prefixed hex bytes");

// ===== REQUEST VALIDATION SCHEMAS =====

// POST /api/raffle/enter
export const enterRaffleSchema = z.object({
  participant: ethereumAddressSchema,
  amount: weiAmountSchema,
});

// GET /api/raffle/players/:index
export const playerIndexParamsSchema = z.object({
  index: z.string().regex(/^\d+$/, "Index must be a non-negative integer"),
});

// POST /api/raffle/perform-upkeep
export const performUpkeepSchema = z.object({
  performData: hexDataSchema.optional(),
});

// POST /api/vrf/fulfill (signed oracle callback)
export const fulfillRandomWordsSchema = z.object({
  requestId: requestIdSchema,
  randomWords: z.array(uint256Schema),
});

// POST /api/admin/mock-vrf/fulfill
export const mockFulfillSchema = z.object({
  requestId: requestIdSchema,
  randomWords: z.array(uint256Schema).min(1).optional(),
});

// GET /api/raffle/events
export const eventsQuerySchema = z.object({
  type: z.enum(["Entered", "DrawRequested", "WinnerPicked"]).optional(),
  limit: z
    .string()
    .regex(/^\d+$/, "Limit must be a positive integer")
    .refine((val) => {
      const num = parseInt(val, 10);
      return num >= 1 && num <= 100;
    }, "Limit must be between 1 and 100")
    .optional(),
  offset: z.string().regex(/^\d+$/, "Offset must be a non-negative integer").optional(),
});

// GET /api/raffle/winners
export const winnersQuerySchema = z.object({
  limit: z
    .string()
    .regex(/^\d+$/, "Limit must be a positive integer")
    .refine((val) => {
      const num = parseInt(val, 10);
      return num >= 1 && num <= 100;
    }, "Limit must be between 1 and 100")
    .optional(),
});

// ===== VALIDATION MIDDLEWARE FACTORY =====

type RequestPart = "body" | "query" | "params";

function formatIssues(error: z.ZodError) {
  return error.issues.map((err) => ({
    field: err.path.join("."),
    message: err.message,
  }));
}

function validate<T>(part: RequestPart, schema: z.ZodSchema<T>) {
  const label = part === "body" ? "Input" : part === "query" ? "Query" : "Parameter";

  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req[part]);

    if (!result.success) {
      const errors = formatIssues(result.error);

      // Log validation failure for security monitoring
      console.warn(`🚫 [VALIDATION ERROR] ${label} validation failed`, {
        timestamp: new Date().toISOString(),
        ip: req.ip || req.socket?.remoteAddress,
        endpoint: `${req.method} ${req.path}`,
        errors,
      });

      return res.status(400).json({
        success: false,
        error: `${label} validation failed`,
        code: "VALIDATION_ERROR",
        details: errors,
      });
    }

    // Query and params stay as parsed by express; handlers re-read them
    // knowing they passed validation. The body is replaced with parsed data.
    if (part === "body") {
      req.body = result.data;
    }
    return next();
  };
}

/**
 * Creates validation middleware for request body
 */
export function validateBody<T>(schema: z.ZodSchema<T>) {
  return validate("body", schema);
}

/**
 * Creates validation middleware for query parameters
 */
export function validateQuery<T>(schema: z.ZodSchema<T>) {
  return validate("query", schema);
}

/**
 * Creates validation middleware for route parameters
 */
export function validateParams<T>(schema: z.ZodSchema<T>) {
  return validate("params", schema);
}
