import { loadEnv } from "./utils/loadEnv";
import { createApp } from "./app";
import { bootstrapRaffle, startServices, stopServices } from "./services/startServices";

async function main(): Promise<void> {
  const env = loadEnv();
  const isProduction = env.NODE_ENV === "production";

  // Log admin configuration for verification
  console.log(`[ADMIN] Loaded ADMIN_API_KEY prefix: ${env.ADMIN_API_KEY.slice(0, 6)}...`);
  if (!env.KEEPER_API_KEY) {
    console.log("[ADMIN] KEEPER_API_KEY not set; perform-upkeep accepts the admin key only");
  }

  const services = await bootstrapRaffle(env);

  const app = createApp({
    raffle: services.raffle,
    winners: services.winners,
    network: env.NETWORK,
    adminApiKey: env.ADMIN_API_KEY,
    keeperApiKey: env.KEEPER_API_KEY,
    vrfWebhookSecret: env.VRF_WEBHOOK_SECRET,
    mockCoordinator: services.mockCoordinator,
    keeper: services.keeper,
    isProduction,
    frontendUrl: env.FRONTEND_URL,
  });

  // 🚀 START SERVER FIRST - background services follow once it is listening
  const server = app.listen(env.PORT, () => {
    console.log(`🚀 Server running on port ${env.PORT}`);
    console.log(`📊 Environment: ${env.NODE_ENV}`);
    startServices(services);
  });

  const shutdown = (signal: string) => {
    console.log(`🛑 ${signal} received, shutting down...`);
    server.close(() => {
      stopServices(services)
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          console.error("❌ Error during shutdown:", err);
          process.exit(1);
        });
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

// Handle unhandled promise rejections
process.on("unhandledRejection", (reason, promise) => {
  console.error("❌ Unhandled Rejection at:", promise, "reason:", reason);
  if (process.env.NODE_ENV === "production") {
    console.log("⚠️ Continuing execution despite unhandled rejection");
  } else {
    process.exit(1);
  }
});

main().catch((err: unknown) => {
  console.error("❌ Failed to start server:", err);
  process.exit(1);
});
