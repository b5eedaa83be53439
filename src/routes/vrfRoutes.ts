import { Router } from "express";
import { createVrfController } from "../controllers/vrfController";
import { privilegedRateLimit } from "../middleware/rateLimiting";
import { fulfillRandomWordsSchema, validateBody } from "../middleware/validation";
import { requireVrfSignature } from "../middleware/vrfSignature";

type VrfController = ReturnType<typeof createVrfController>;

export function createVrfRoutes(
  controller: VrfController,
  webhookSecret: string | undefined
): Router {
  const router = Router();

  // POST /fulfill - Oracle callback, HMAC-signed
  router.post(
    "/fulfill",
    privilegedRateLimit,
    requireVrfSignature(webhookSecret),
    validateBody(fulfillRandomWordsSchema),
    controller.fulfillRandomWords
  );

  return router;
}
