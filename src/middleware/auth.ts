import { Request, Response, NextFunction } from "express";
import { auditSecurity, AuditActionType } from "../utils/auditLogger";
import crypto from "crypto";

export type ApiKeyRole = "admin" | "keeper";

function keysMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  // timingSafeEqual throws on length mismatch
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

/**
 * Bearer API key check. Accepts any of the given keys; undefined entries
 * (an unset optional key) are skipped.
 * Header format: Authorization: Bearer <api-key>
 */
export const requireApiKey = (
  role: ApiKeyRole,
  keys: Array<string | undefined>
) => {
  const configured = keys.filter((k): k is string => Boolean(k));

  return (req: Request, res: Response, next: NextFunction) => {
    // Check if an API key is configured
    if (configured.length === 0) {
      console.error(`🚨 [AUTH] No ${role} API key configured`);
      return res.status(500).json({
        success: false,
        error:
          "Server configuration error - authentication not properly configured",
      });
    }

    const authHeader = req.headers.authorization;

    // Check if authorization header exists
    if (!authHeader || !authHeader.startsWith("Bearer ")) {
      console.warn(
        `🚨 [AUTH] Unauthorized ${role} access attempt - Missing/invalid authorization header`
      );
      return res.status(401).json({
        success: false,
        error:
          "Authorization required. Include header: Authorization: Bearer <api-key>",
      });
    }

    const providedKey = authHeader.substring(7); // Remove 'Bearer '

    if (!providedKey || !configured.some((key) => keysMatch(providedKey, key))) {
      auditSecurity(AuditActionType.AUTH_FAILURE, req, {
        role,
        reason: "invalid_api_key",
        provided_key_length: providedKey.length,
      });

      return res.status(403).json({
        success: false,
        error: "Invalid API key",
      });
    }

    console.log(`🔐 [${role.toUpperCase()} AUTH] Authenticated for ${req.method} ${req.path}`);
    return next();
  };
};

/**
 * Admin-only endpoints.
 */
export const requireAdminAuth = (adminApiKey: string) =>
  requireApiKey("admin", [adminApiKey]);

/**
 * Upkeep triggering: the keeper key, or the admin key as a fallback.
 */
export const requireKeeperAuth = (
  keeperApiKey: string | undefined,
  adminApiKey: string
) => requireApiKey("keeper", [keeperApiKey, adminApiKey]);
