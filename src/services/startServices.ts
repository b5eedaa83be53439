import { ethers } from "ethers";
import { Pool } from "pg";
import { Env } from "../utils/loadEnv";
import {
  isDevelopmentNetwork,
  logNetworkConfig,
  resolveRaffleConfig,
} from "../utils/networkConfig";
import { createPool } from "../db/connection";
import { AppStateRepository } from "../db/appStateRepository";
import {
  InMemoryRaffleStateStore,
  PgRaffleStateStore,
  RaffleStateStore,
} from "../db/raffleStateStore";
import {
  InMemoryWinnerRepository,
  PgWinnerRepository,
  WinnerRepository,
} from "../db/winnerRepository";
import { Raffle, createRaffle } from "./raffle";
import { MockVrfCoordinator } from "./mockVrfCoordinator";
import { HttpRandomnessProvider } from "./httpRandomnessProvider";
import { InMemoryPaymentRail } from "./paymentRail";
import { restorePersistedRaffle, startRaffleListeners } from "./raffleListeners";
import { UpkeepKeeper } from "./upkeepKeeper";

export interface RaffleServices {
  raffle: Raffle;
  winners: WinnerRepository;
  store: RaffleStateStore;
  keeper: UpkeepKeeper;
  paymentRail: InMemoryPaymentRail;
  mockCoordinator?: MockVrfCoordinator;
  pool?: Pool;
  stopListeners: () => void;
}

function buildStores(env: Env): {
  store: RaffleStateStore;
  winners: WinnerRepository;
  pool?: Pool;
} {
  if (!env.DATABASE_URL) {
    console.warn(
      "⚠️ [INIT] DATABASE_URL not set: raffle state and winners are kept in memory only"
    );
    return {
      store: new InMemoryRaffleStateStore(),
      winners: new InMemoryWinnerRepository(),
    };
  }

  const pool = createPool(env.DATABASE_URL, env.NODE_ENV);
  return {
    store: new PgRaffleStateStore(new AppStateRepository(pool)),
    winners: new PgWinnerRepository(pool),
    pool,
  };
}

/**
 * Build the raffle for the configured network, restore its persisted state
 * and attach the persistence listeners. The keeper is created but not
 * started; the server starts it once it is listening.
 */
export async function bootstrapRaffle(env: Env): Promise<RaffleServices> {
  const config = resolveRaffleConfig(env);
  const { store, winners, pool } = buildStores(env);
  const paymentRail = new InMemoryPaymentRail();

  let raffle: Raffle;
  let mockCoordinator: MockVrfCoordinator | undefined;

  if (isDevelopmentNetwork(env.NETWORK)) {
    console.log("🧪 Local network detected! Deploying mocks...");
    mockCoordinator = new MockVrfCoordinator();
    const subscriptionId = mockCoordinator.createSubscription();
    mockCoordinator.fundSubscription(
      subscriptionId,
      ethers.parseEther(env.VRF_SUB_FUND_AMOUNT)
    );

    raffle = createRaffle({
      config: { ...config, subscriptionId },
      provider: mockCoordinator,
      paymentRail,
    });
    mockCoordinator.addConsumer(subscriptionId, raffle.coordinator);
    console.log(
      `✅ Mock coordinator ready (subscription ${subscriptionId}, funded ${env.VRF_SUB_FUND_AMOUNT} LINK)`
    );
  } else {
    const serviceUrl = env.VRF_SERVICE_URL;
    if (!serviceUrl) {
      throw new Error("VRF_SERVICE_URL is required outside development networks");
    }
    const provider = new HttpRandomnessProvider({
      serviceUrl,
      apiKey: env.VRF_SERVICE_API_KEY,
      callbackUrl: `${env.BACKEND_URL.replace(/\/$/, "")}/api/vrf/fulfill`,
    });
    raffle = createRaffle({ config, provider, paymentRail });
    console.warn(
      "⚠️ [PAYOUT] Payouts are recorded on the in-process payment rail; settlement happens outside this service"
    );
  }

  logNetworkConfig(env.NETWORK, raffle.config);

  await restorePersistedRaffle(raffle, store);
  const stopListeners = startRaffleListeners(raffle, store, winners);
  const keeper = new UpkeepKeeper(raffle.coordinator, env.UPKEEP_POLL_INTERVAL_MS);

  return {
    raffle,
    winners,
    store,
    keeper,
    paymentRail,
    mockCoordinator,
    pool,
    stopListeners,
  };
}

/**
 * Background services that run after the server is listening.
 */
export function startServices(services: RaffleServices): void {
  console.log("🚀 Starting background services...");
  services.keeper.start();
}

export async function stopServices(services: RaffleServices): Promise<void> {
  services.keeper.stop();
  services.stopListeners();
  if (services.pool) {
    await services.pool.end();
  }
}
