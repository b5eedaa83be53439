import express from "express";
import cors from "cors";
import { Raffle } from "./services/raffle";
import { UpkeepKeeper } from "./services/upkeepKeeper";
import { MockVrfCoordinator } from "./services/mockVrfCoordinator";
import { WinnerRepository } from "./db/winnerRepository";
import { getSecurityHeaders } from "./middleware/securityHeaders";
import { captureRawBody } from "./middleware/vrfSignature";
import { createRaffleController } from "./controllers/raffleController";
import { createVrfController } from "./controllers/vrfController";
import { createRaffleRoutes } from "./routes/raffleRoutes";
import { createVrfRoutes } from "./routes/vrfRoutes";
import { createAdminRoutes } from "./routes/adminRoutes";
import { createHealthRoutes } from "./routes/healthRoutes";
import { sanitizeErrorResponse } from "./utils/auditLogger";

export interface AppDeps {
  raffle: Raffle;
  winners: WinnerRepository;
  network: string;
  adminApiKey: string;
  keeperApiKey?: string;
  vrfWebhookSecret?: string;
  /** Present on development networks only. */
  mockCoordinator?: MockVrfCoordinator;
  keeper?: UpkeepKeeper;
  isProduction?: boolean;
  frontendUrl?: string;
}

const LOCAL_ORIGINS = [
  "http://localhost:3000",
  "http://localhost:3001",
  "http://127.0.0.1:3000",
  "http://127.0.0.1:3001",
];

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  // Apply security headers first
  app.use(getSecurityHeaders(deps.isProduction ?? false));
  app.set("trust proxy", 1);

  const allowedOrigins = deps.frontendUrl
    ? [...LOCAL_ORIGINS, deps.frontendUrl.replace(/\/$/, "")]
    : LOCAL_ORIGINS;
  console.log("🔒 [CORS] Allowed origins:", allowedOrigins);
  app.use(
    cors({
      // Requests without an Origin (server-to-server, keepers, the oracle) pass
      origin: (origin, callback) => {
        if (!origin || allowedOrigins.includes(origin)) {
          callback(null, true);
          return;
        }
        console.warn(`🚨 [CORS] Origin blocked: ${origin}`);
        callback(null, false);
      },
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization", "X-Vrf-Signature"],
      exposedHeaders: ["RateLimit-Limit", "RateLimit-Remaining", "RateLimit-Reset"],
      maxAge: 86400,
    })
  );

  // The oracle signs the exact body bytes, so keep them for the webhook
  app.use(express.json({ limit: "100kb", verify: captureRawBody }));

  const raffleController = createRaffleController(deps.raffle, deps.winners);
  const vrfController = createVrfController(deps.raffle, deps.mockCoordinator);

  app.use(
    "/health",
    createHealthRoutes({ raffle: deps.raffle, network: deps.network, keeper: deps.keeper })
  );
  app.use(
    "/api/raffle",
    createRaffleRoutes(raffleController, {
      adminApiKey: deps.adminApiKey,
      keeperApiKey: deps.keeperApiKey,
    })
  );
  app.use("/api/vrf", createVrfRoutes(vrfController, deps.vrfWebhookSecret));
  app.use("/api/admin", createAdminRoutes(vrfController, deps.adminApiKey));

  app.use((_req, res) =>
    res.status(404).json({ success: false, error: "Route not found" })
  );
  app.use(
    (
      err: Error & { status?: number; type?: string },
      _req: express.Request,
      res: express.Response,
      _next: express.NextFunction
    ) => {
      // Malformed JSON bodies surface here from express.json()
      if (err.type === "entity.parse.failed") {
        res.status(400).json({ success: false, error: "Malformed JSON body" });
        return;
      }
      const { logDetails } = sanitizeErrorResponse(err);
      console.error("Unhandled error:", logDetails);
      res.status(err.status ?? 500).json({ success: false, error: "Internal server error" });
    }
  );

  return app;
}
