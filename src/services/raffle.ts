import { RaffleConfig, RaffleSnapshot, RaffleState } from "../types/raffle";
import { Clock, systemClock } from "../utils/clock";
import { RaffleEventLog } from "./raffleEvents";
import { RaffleLedger, createRaffleConfig } from "./raffleLedger";
import { UpkeepCoordinator } from "./upkeepCoordinator";
import { RandomnessProvider } from "./randomnessProvider";
import { PaymentRail } from "./paymentRail";

export interface Raffle {
  config: Readonly<RaffleConfig>;
  events: RaffleEventLog;
  ledger: RaffleLedger;
  coordinator: UpkeepCoordinator;
}

export interface CreateRaffleOptions {
  config: RaffleConfig;
  provider: RandomnessProvider;
  paymentRail: PaymentRail;
  clock?: Clock;
  consumerId?: string;
  /** Events kept in memory for the events endpoint. */
  maxEventHistory?: number;
}

/** One ledger + coordinator pair per raffle, wired to a shared event log. */
export function createRaffle(options: CreateRaffleOptions): Raffle {
  const config = createRaffleConfig(options.config);
  const clock = options.clock ?? systemClock;
  const events = new RaffleEventLog(options.maxEventHistory);
  const ledger = new RaffleLedger(config, events, clock);
  const coordinator = new UpkeepCoordinator({
    ledger,
    events,
    provider: options.provider,
    paymentRail: options.paymentRail,
    clock,
    consumerId: options.consumerId,
  });

  return { config, events, ledger, coordinator };
}

export function snapshotRaffle(raffle: Raffle): RaffleSnapshot {
  return raffle.ledger.snapshot(raffle.coordinator.getPendingRequestId());
}

export function restoreRaffle(raffle: Raffle, snapshot: RaffleSnapshot): void {
  if (
    (snapshot.state === RaffleState.CALCULATING) !==
    (snapshot.pendingRequestId !== null)
  ) {
    throw new Error(
      `Inconsistent snapshot: state ${snapshot.state} with pending request ${snapshot.pendingRequestId}`
    );
  }
  raffle.ledger.restore(snapshot);
  raffle.coordinator.restorePendingRequest(
    snapshot.pendingRequestId === null ? null : BigInt(snapshot.pendingRequestId)
  );
}
