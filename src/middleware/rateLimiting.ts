import rateLimit from "express-rate-limit";
import { Request, Response } from "express";
import * as crypto from "crypto";

/**
 * Generate a client fingerprint based on multiple request characteristics
 * This helps identify clients even when they change IPs
 */
const generateClientFingerprint = (req: Request): string => {
  const components = [
    req.headers["user-agent"] || "",
    req.headers["accept-language"] || "",
    req.headers["accept-encoding"] || "",
  ];

  return crypto
    .createHash("sha256")
    .update(components.join("|"))
    .digest("hex")
    .substring(0, 16);
};

const createCompositeKey = (req: Request): string => {
  const ip = req.ip || req.socket?.remoteAddress || "unknown";
  return `${ip}:${generateClientFingerprint(req)}`;
};

const createRateLimitMessage = (context: string) => {
  return (req: Request, res: Response) => {
    console.warn(`🚨 [RATE LIMIT] ${context} rate limit exceeded`, {
      timestamp: new Date().toISOString(),
      fingerprint: generateClientFingerprint(req),
      endpoint: `${req.method} ${req.path}`,
    });

    res.status(429).json({
      success: false,
      error: `Too many requests. Rate limit exceeded for ${context.toLowerCase()}.`,
      code: "RATE_LIMITED",
    });
  };
};

/**
 * Read-only raffle queries
 */
export const publicDataRateLimit = rateLimit({
  windowMs: 1 * 60 * 1000, // 1 minute
  max: 300,
  keyGenerator: createCompositeKey,
  handler: createRateLimitMessage("Public Data API"),
  standardHeaders: true,
  legacyHeaders: false,
});

/**
 * Raffle entries
 */
export const entryRateLimit = rateLimit({
  windowMs: 1 * 60 * 1000,
  max: 60,
  keyGenerator: createCompositeKey,
  handler: createRateLimitMessage("Raffle Entry"),
  standardHeaders: true,
  legacyHeaders: false,
});

/**
 * Keeper, oracle and admin endpoints
 */
export const privilegedRateLimit = rateLimit({
  windowMs: 1 * 60 * 1000,
  max: 120,
  keyGenerator: createCompositeKey,
  handler: createRateLimitMessage("Privileged API"),
  standardHeaders: true,
  legacyHeaders: false,
});

export { generateClientFingerprint, createCompositeKey };
