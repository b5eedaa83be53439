import { Router } from "express";
import { RaffleController } from "../controllers/raffleController";
import {
  entryRateLimit,
  privilegedRateLimit,
  publicDataRateLimit,
} from "../middleware/rateLimiting";
import {
  enterRaffleSchema,
  eventsQuerySchema,
  performUpkeepSchema,
  playerIndexParamsSchema,
  validateBody,
  validateParams,
  validateQuery,
  winnersQuerySchema,
} from "../middleware/validation";
import { requireKeeperAuth } from "../middleware/auth";

export interface RaffleRouteKeys {
  adminApiKey: string;
  keeperApiKey?: string;
}

export function createRaffleRoutes(
  controller: RaffleController,
  keys: RaffleRouteKeys
): Router {
  const router = Router();

  // Read-only queries
  router.get("/", publicDataRateLimit, controller.getRaffle);
  router.get(
    "/players/:index",
    publicDataRateLimit,
    validateParams(playerIndexParamsSchema),
    controller.getPlayer
  );
  router.get("/upkeep", publicDataRateLimit, controller.getUpkeep);
  router.get(
    "/events",
    publicDataRateLimit,
    validateQuery(eventsQuerySchema),
    controller.getEvents
  );
  router.get(
    "/winners",
    publicDataRateLimit,
    validateQuery(winnersQuerySchema),
    controller.getWinners
  );

  // POST /enter - Deposit the entrance fee
  router.post(
    "/enter",
    entryRateLimit,
    validateBody(enterRaffleSchema),
    controller.enterRaffle
  );

  // POST /perform-upkeep - Start a draw (KEEPER or ADMIN)
  router.post(
    "/perform-upkeep",
    privilegedRateLimit,
    requireKeeperAuth(keys.keeperApiKey, keys.adminApiKey),
    validateBody(performUpkeepSchema),
    controller.performUpkeep
  );

  return router;
}
