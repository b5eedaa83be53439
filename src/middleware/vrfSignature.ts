import { IncomingMessage } from "http";
import { Request, Response, NextFunction } from "express";
import crypto from "crypto";
import { auditSecurity, AuditActionType } from "../utils/auditLogger";

export const VRF_SIGNATURE_HEADER = "x-vrf-signature";

const rawBodies = new WeakMap<IncomingMessage, Buffer>();

/**
 * `verify` hook for express.json(): keeps the exact bytes the oracle signed.
 */
export function captureRawBody(req: IncomingMessage, _res: unknown, buf: Buffer): void {
  rawBodies.set(req, Buffer.from(buf));
}

export function signVrfPayload(secret: string, payload: string | Buffer): string {
  return crypto.createHmac("sha256", secret).update(payload).digest("hex");
}

export function isValidVrfSignature(
  secret: string,
  payload: Buffer,
  provided: string
): boolean {
  const normalized = provided.trim().toLowerCase().replace(/^sha256=/, "");
  if (!/^[a-f0-9]{64}$/.test(normalized)) return false;
  const expected = signVrfPayload(secret, payload);
  return crypto.timingSafeEqual(Buffer.from(normalized, "hex"), Buffer.from(expected, "hex"));
}

/**
 * Rejects oracle callbacks whose X-Vrf-Signature is not the HMAC-SHA256 of
 * the raw request body under the webhook secret.
 */
export const requireVrfSignature = (secret: string | undefined) => {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!secret) {
      console.error("🚨 [VRF WEBHOOK] VRF_WEBHOOK_SECRET not configured");
      return res.status(500).json({
        success: false,
        error: "Server configuration error - webhook secret not configured",
      });
    }

    const provided = req.get(VRF_SIGNATURE_HEADER);
    const raw = rawBodies.get(req);

    if (!provided || !raw || !isValidVrfSignature(secret, raw, provided)) {
      auditSecurity(AuditActionType.WEBHOOK_SIGNATURE_FAILURE, req, {
        hasSignature: Boolean(provided),
        rawBodyLength: raw ? raw.length : 0,
      });
      return res.status(401).json({
        success: false,
        error: "Invalid webhook signature",
        code: "INVALID_SIGNATURE",
      });
    }

    return next();
  };
};
