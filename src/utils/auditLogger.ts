import { Request } from "express";
import crypto from "crypto";

// ===== AUDIT LOG LEVELS =====
export enum AuditLogLevel {
  ACTION = "ACTION", // Admin action initiated
  SUCCESS = "SUCCESS", // Action completed successfully
  FAILURE = "FAILURE", // Action failed
  WARNING = "WARNING", // Suspicious or noteworthy activity
  SECURITY = "SECURITY", // Security-related events
}

// ===== AUDIT LOG TYPES =====
export enum AuditActionType {
  // Raffle Operations
  PERFORM_UPKEEP = "PERFORM_UPKEEP",
  FULFILL_RANDOM_WORDS = "FULFILL_RANDOM_WORDS",
  MOCK_FULFILL = "MOCK_FULFILL",

  // Authentication
  AUTH_FAILURE = "AUTH_FAILURE",
  WEBHOOK_SIGNATURE_FAILURE = "WEBHOOK_SIGNATURE_FAILURE",
}

type AuditDetails = Record<string, unknown>;

// ===== AUDIT LOG INTERFACE =====
export interface AuditLogEntry {
  timestamp: string;
  level: AuditLogLevel;
  action: AuditActionType;
  ip: string;
  userAgent?: string;
  endpoint: string;
  details: AuditDetails;
  success: boolean;
  error?: string;
  duration?: number;
}

// ===== AUDIT LOGGER CLASS =====
export class AuditLogger {
  private static instance: AuditLogger;

  static getInstance(): AuditLogger {
    if (!AuditLogger.instance) {
      AuditLogger.instance = new AuditLogger();
    }
    return AuditLogger.instance;
  }

  /**
   * Sanitize PII by hashing with a salt
   */
  private sanitizePII(data: string): string {
    const salt = process.env.LOG_SALT || "audit-log-salt";
    return crypto
      .createHash("sha256")
      .update(data + salt)
      .digest("hex")
      .substring(0, 12);
  }

  private extractRequestInfo(req: Request) {
    const rawIP = req.ip || req.socket?.remoteAddress || "unknown";
    const rawUserAgent = req.headers["user-agent"] || "unknown";

    return {
      ip: this.sanitizePII(rawIP),
      userAgent: this.sanitizePII(rawUserAgent),
      endpoint: `${req.method} ${req.path}`,
      timestamp: new Date().toISOString(),
    };
  }

  logAction(action: AuditActionType, req: Request, details: AuditDetails = {}): void {
    const logEntry: AuditLogEntry = {
      ...this.extractRequestInfo(req),
      level: AuditLogLevel.ACTION,
      action,
      details,
      success: true,
    };

    console.log(`🔐 [ADMIN ${action}] Action initiated`, logEntry);
  }

  logSuccess(
    action: AuditActionType,
    req: Request,
    details: AuditDetails = {},
    startTime?: number
  ): void {
    const logEntry: AuditLogEntry = {
      ...this.extractRequestInfo(req),
      level: AuditLogLevel.SUCCESS,
      action,
      details,
      success: true,
      duration: startTime ? Date.now() - startTime : undefined,
    };

    console.log(`✅ [ADMIN ${action}] Operation successful`, logEntry);
  }

  logFailure(
    action: AuditActionType,
    req: Request,
    error: string,
    details: AuditDetails = {},
    startTime?: number
  ): void {
    const logEntry: AuditLogEntry = {
      ...this.extractRequestInfo(req),
      level: AuditLogLevel.FAILURE,
      action,
      details,
      success: false,
      error,
      duration: startTime ? Date.now() - startTime : undefined,
    };

    console.error(`❌ [ADMIN ${action}] Operation failed`, logEntry);
  }

  logSecurity(action: AuditActionType, req: Request, details: AuditDetails = {}): void {
    const logEntry: AuditLogEntry = {
      ...this.extractRequestInfo(req),
      level: AuditLogLevel.SECURITY,
      action,
      details,
      success: false, // Security events are typically failures
    };

    console.warn(`🚨 [SECURITY ${action}] Security event detected`, logEntry);
  }

  startTimer(): number {
    return Date.now();
  }
}

// ===== CONVENIENCE FUNCTIONS =====
export const auditLogger = AuditLogger.getInstance();

export const auditAction = (
  action: AuditActionType,
  req: Request,
  details?: AuditDetails
) => auditLogger.logAction(action, req, details);

export const auditSuccess = (
  action: AuditActionType,
  req: Request,
  details?: AuditDetails,
  startTime?: number
) => auditLogger.logSuccess(action, req, details, startTime);

export const auditFailure = (
  action: AuditActionType,
  req: Request,
  error: string,
  details?: AuditDetails,
  startTime?: number
) => auditLogger.logFailure(action, req, error, details, startTime);

export const auditSecurity = (
  action: AuditActionType,
  req: Request,
  details?: AuditDetails
) => auditLogger.logSecurity(action, req, details);

// Error Response Sanitization Utilities
/**
 * Full error details for the server log, and a message that is safe to
 * return to clients (generic in production).
 */
export const sanitizeErrorResponse = (
  error: unknown,
  fallbackMessage: string = "Internal server error"
): {
  message: string;
  logDetails: { message: string; stack?: string; name?: string; timestamp: string };
} => {
  const isProduction = process.env.NODE_ENV === "production";
  const err = error instanceof Error ? error : undefined;

  const logDetails = {
    message: err?.message || String(error ?? "Unknown error"),
    stack: err?.stack,
    name: err?.name,
    timestamp: new Date().toISOString(),
  };

  const clientMessage = isProduction
    ? fallbackMessage
    : err?.message || fallbackMessage;

  return { message: clientMessage, logDetails };
};

/**
 * Creates a standardized error response object for APIs
 */
export const createErrorResponse = (
  error: unknown,
  fallbackMessage: string = "Internal server error"
) => {
  const { message } = sanitizeErrorResponse(error, fallbackMessage);

  return {
    success: false,
    error: message,
  };
};
