import express from "express";
import { Raffle } from "../services/raffle";
import { UpkeepKeeper } from "../services/upkeepKeeper";

export interface HealthDeps {
  raffle: Raffle;
  network: string;
  keeper?: UpkeepKeeper;
}

export function createHealthRoutes({ raffle, network, keeper }: HealthDeps) {
  const router = express.Router();

  /**
   * GET /health
   * Liveness; never waits on external dependencies
   */
  router.get("/", (_req, res) => {
    res.json({
      status: "OK",
      timestamp: new Date().toISOString(),
      environment: process.env.NODE_ENV || "development",
      network,
      uptime: process.uptime(),
      raffle: {
        state: raffle.ledger.getRaffleState(),
        players: raffle.ledger.getNumberOfPlayers(),
      },
      keeper: keeper?.isStarted() ? "running" : "stopped",
    });
  });

  return router;
}
