import { FulfillmentOutcome, RaffleEvent } from "../types/raffle";
import { RaffleStatusView } from "../types";
import { Raffle } from "../services/raffle";

// JSON has no bigint: amounts, request ids and random words go out as decimal strings.

export type Jsonified<T> = T extends bigint
  ? string
  : T extends object
  ? { [K in keyof T]: Jsonified<T[K]> }
  : T;

export function serializeEvent(event: RaffleEvent): Jsonified<RaffleEvent> {
  switch (event.type) {
    case "Entered":
      return { ...event, amount: event.amount.toString() };
    case "DrawRequested":
      return { ...event, requestId: event.requestId.toString() };
    case "WinnerPicked":
      return {
        ...event,
        requestId: event.requestId.toString(),
        prize: event.prize.toString(),
        randomWord: event.randomWord.toString(),
      };
  }
}

export function serializeOutcome(
  outcome: FulfillmentOutcome
): Jsonified<FulfillmentOutcome> {
  if (outcome.status === "ignored") {
    return { ...outcome, requestId: outcome.requestId.toString() };
  }
  return {
    ...outcome,
    requestId: outcome.requestId.toString(),
    prize: outcome.prize.toString(),
    randomWord: outcome.randomWord.toString(),
  };
}

export function raffleStatusView(raffle: Raffle): RaffleStatusView {
  const { ledger, coordinator } = raffle;
  const pending = coordinator.getPendingRequestId();
  return {
    entranceFee: ledger.getEntranceFee().toString(),
    raffleState: ledger.getRaffleState(),
    numberOfPlayers: ledger.getNumberOfPlayers(),
    pooledBalance: ledger.getPooledBalance().toString(),
    recentWinner: ledger.getRecentWinner(),
    interval: ledger.getInterval(),
    latestTimestamp: ledger.getLatestTimestamp(),
    requestConfirmations: ledger.getRequestConfirmations(),
    numWords: ledger.getNumWords(),
    pendingRequestId: pending === null ? null : pending.toString(),
  };
}
