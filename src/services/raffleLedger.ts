import { ethers } from "ethers";
import {
  RaffleConfig,
  RaffleSnapshot,
  RaffleState,
} from "../types/raffle";
import {
  IndexOutOfRangeError,
  InsufficientStakeError,
  InvalidParticipantError,
  InvalidRaffleConfigError,
  NotOpenError,
} from "../utils/raffleErrors";
import { RaffleEventLog } from "./raffleEvents";
import { Clock } from "../utils/clock";

/** Validate and freeze a raffle configuration. */
export function createRaffleConfig(input: RaffleConfig): Readonly<RaffleConfig> {
  if (input.entranceFee < 0n) {
    throw new InvalidRaffleConfigError("entranceFee", "must not be negative");
  }
  if (!Number.isInteger(input.interval) || input.interval <= 0) {
    throw new InvalidRaffleConfigError("interval", "must be a positive integer of seconds");
  }
  if (!ethers.isHexString(input.keyHash, 32)) {
    throw new InvalidRaffleConfigError("keyHash", "must be a 32-byte hex string");
  }
  if (input.subscriptionId < 0n) {
    throw new InvalidRaffleConfigError("subscriptionId", "must not be negative");
  }
  if (!Number.isInteger(input.requestConfirmations) || input.requestConfirmations < 1) {
    throw new InvalidRaffleConfigError("requestConfirmations", "must be at least 1");
  }
  if (!Number.isInteger(input.callbackGasLimit) || input.callbackGasLimit <= 0) {
    throw new InvalidRaffleConfigError("callbackGasLimit", "must be a positive integer");
  }
  return Object.freeze({ ...input, numWords: 1 });
}

/**
 * Entrants, pooled balance and cycle metadata of one raffle.
 *
 * Public mutators validate their input; the cycle transitions
 * (markCalculating / reopen / completeCycle) are reserved for the
 * UpkeepCoordinator, which owns the draw lifecycle.
 */
export class RaffleLedger {
  private players: string[] = [];
  private pooledBalance = 0n;
  private state: RaffleState = RaffleState.OPEN;
  private lastTimestamp: number;
  private recentWinner: string | null = null;

  constructor(
    readonly config: Readonly<RaffleConfig>,
    private readonly events: RaffleEventLog,
    private readonly clock: Clock
  ) {
    this.lastTimestamp = clock.now();
  }

  /**
   * Deposit one entrance fee. Each call adds a separate slot, so the same
   * address may hold several. Synchronous, so it cannot interleave with
   * another raffle operation.
   */
  enterRaffle(participant: string, amount: bigint): number {
    if (amount < this.config.entranceFee) {
      throw new InsufficientStakeError(amount, this.config.entranceFee);
    }
    if (this.state !== RaffleState.OPEN) {
      throw new NotOpenError(this.state);
    }
    if (!ethers.isAddress(participant)) {
      throw new InvalidParticipantError(participant);
    }

    const checksummed = ethers.getAddress(participant);
    this.players.push(checksummed);
    this.pooledBalance += amount;

    console.log(
      `🎟️ [RAFFLE] ${checksummed} entered with ${amount} (players: ${this.players.length}, pool: ${this.pooledBalance})`
    );
    this.events.emit({
      type: "Entered",
      participant: checksummed,
      amount,
      timestamp: this.clock.now(),
    });

    return this.players.length;
  }

  getPlayer(index: number): string {
    if (!Number.isInteger(index) || index < 0 || index >= this.players.length) {
      throw new IndexOutOfRangeError(index, this.players.length);
    }
    return this.players[index];
  }

  getPlayers(): string[] {
    return [...this.players];
  }

  getNumberOfPlayers(): number {
    return this.players.length;
  }

  getPooledBalance(): bigint {
    return this.pooledBalance;
  }

  getRecentWinner(): string | null {
    return this.recentWinner;
  }

  getRaffleState(): RaffleState {
    return this.state;
  }

  getLatestTimestamp(): number {
    return this.lastTimestamp;
  }

  getEntranceFee(): bigint {
    return this.config.entranceFee;
  }

  getInterval(): number {
    return this.config.interval;
  }

  getRequestConfirmations(): number {
    return this.config.requestConfirmations;
  }

  getNumWords(): number {
    return this.config.numWords;
  }

  /* ---------- Cycle transitions (coordinator only) ---------- */

  markCalculating(): void {
    if (this.state !== RaffleState.OPEN) {
      throw new Error(`Illegal transition ${this.state} -> CALCULATING`);
    }
    this.state = RaffleState.CALCULATING;
  }

  /** Undo markCalculating when no request could be placed. */
  reopen(): void {
    if (this.state !== RaffleState.CALCULATING) {
      throw new Error(`Illegal transition ${this.state} -> OPEN`);
    }
    this.state = RaffleState.OPEN;
  }

  /**
   * Close the cycle in one step: record the winner, clear entrants,
   * zero the pool, stamp the draw time and reopen.
   */
  completeCycle(winner: string, now: number): void {
    if (this.state !== RaffleState.CALCULATING) {
      throw new Error(`Illegal transition ${this.state} -> OPEN`);
    }
    this.recentWinner = winner;
    this.players = [];
    this.pooledBalance = 0n;
    this.lastTimestamp = now;
    this.state = RaffleState.OPEN;
  }

  /* ---------- Persistence ---------- */

  snapshot(pendingRequestId: bigint | null): RaffleSnapshot {
    return {
      state: this.state,
      players: [...this.players],
      pooledBalance: this.pooledBalance.toString(),
      lastTimestamp: this.lastTimestamp,
      recentWinner: this.recentWinner,
      pendingRequestId:
        pendingRequestId === null ? null : pendingRequestId.toString(),
    };
  }

  /** All fields are checked before any is assigned. */
  restore(snapshot: RaffleSnapshot): void {
    const players = snapshot.players.map((p) => ethers.getAddress(p));
    const pooledBalance = BigInt(snapshot.pooledBalance);

    this.state = snapshot.state;
    this.players = players;
    this.pooledBalance = pooledBalance;
    this.lastTimestamp = snapshot.lastTimestamp;
    this.recentWinner = snapshot.recentWinner;
  }
}
