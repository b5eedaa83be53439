import { RaffleStateStore } from "../db/raffleStateStore";
import { WinnerRepository } from "../db/winnerRepository";
import { Raffle, restoreRaffle, snapshotRaffle } from "./raffle";

/**
 * Persist the active cycle after every event and record winners.
 * Returns a function that detaches both listeners.
 */
export function startRaffleListeners(
  raffle: Raffle,
  store: RaffleStateStore,
  winners: WinnerRepository
): () => void {
  console.log("🔔 Starting raffle listeners (snapshot + winner history)...");

  // Saves are chained so a slow write never lands after a newer one.
  let saveChain: Promise<void> = Promise.resolve();

  const offSnapshot = raffle.events.onAny((event) => {
    const snapshot = snapshotRaffle(raffle);
    saveChain = saveChain
      .then(() => store.save(snapshot))
      .catch((err: unknown) => {
        console.error(
          `❌ [PERSIST] Failed to save snapshot after ${event.type}:`,
          err instanceof Error ? err.message : err
        );
      });
  });

  const offWinner = raffle.events.on("WinnerPicked", (event) => {
    console.log(`🎯 WinnerPicked: ${event.winner} (request ${event.requestId})`);
    void winners
      .recordWinner({
        requestId: event.requestId,
        winner: event.winner,
        prize: event.prize,
        randomWord: event.randomWord,
        numPlayers: event.numPlayers,
        drawnAt: new Date(event.timestamp * 1000),
      })
      .then((row) => {
        console.log(`✅ Winner row ${row.id} stored for request ${row.request_id}`);
      })
      .catch((err: unknown) => {
        console.error(
          "❌ Error recording WinnerPicked event:",
          err instanceof Error ? err.message : err
        );
      });
  });

  return () => {
    offSnapshot();
    offWinner();
  };
}

/** Load a persisted snapshot into the raffle, if one exists. */
export async function restorePersistedRaffle(
  raffle: Raffle,
  store: RaffleStateStore
): Promise<boolean> {
  const snapshot = await store.load();
  if (!snapshot) {
    console.log("ℹ️ [INIT] No persisted raffle state; starting a fresh cycle");
    return false;
  }
  restoreRaffle(raffle, snapshot);
  console.log(
    `✅ [INIT] Restored raffle: ${snapshot.state}, ${snapshot.players.length} players, pool ${snapshot.pooledBalance}`
  );
  return true;
}
