import { Router } from "express";
import { createVrfController } from "../controllers/vrfController";
import { privilegedRateLimit } from "../middleware/rateLimiting";
import { mockFulfillSchema, validateBody } from "../middleware/validation";
import { requireAdminAuth } from "../middleware/auth";

type VrfController = ReturnType<typeof createVrfController>;

export function createAdminRoutes(
  controller: VrfController,
  adminApiKey: string
): Router {
  const router = Router();

  // POST /mock-vrf/fulfill - Deliver a pending request through the mock coordinator (ADMIN ONLY)
  router.post(
    "/mock-vrf/fulfill",
    privilegedRateLimit,
    requireAdminAuth(adminApiKey),
    validateBody(mockFulfillSchema),
    controller.mockFulfill
  );

  return router;
}
