import { ethers } from "ethers";
import {
  FulfillmentIgnoredReason,
  FulfillmentOutcome,
  RaffleState,
  UpkeepCheckResult,
  UpkeepChecks,
} from "../types/raffle";
import {
  PayoutTransferFailedError,
  UpkeepNotNeededError,
} from "../utils/raffleErrors";
import { ExclusiveLock, withLock } from "../utils/exclusiveLock";
import { Clock } from "../utils/clock";
import { RaffleLedger } from "./raffleLedger";
import { RaffleEventLog } from "./raffleEvents";
import { RandomnessConsumer, RandomnessProvider } from "./randomnessProvider";
import { PaymentRail } from "./paymentRail";

const CHECK_ORDER: (keyof UpkeepChecks)[] = [
  "isOpen",
  "timePassed",
  "hasPlayers",
  "hasBalance",
];

const CHECK_REASONS: Record<keyof UpkeepChecks, string> = {
  isOpen: "raffle-not-open",
  timePassed: "interval-not-elapsed",
  hasPlayers: "no-players",
  hasBalance: "no-balance",
};

/** Decode the performData returned by checkUpkeep into failed check names. */
export function decodePerformData(performData: string): string[] {
  if (!ethers.isHexString(performData) || performData === "0x") return [];
  return ethers.toUtf8String(performData).split(",").filter(Boolean);
}

export interface UpkeepCoordinatorDeps {
  ledger: RaffleLedger;
  events: RaffleEventLog;
  provider: RandomnessProvider;
  paymentRail: PaymentRail;
  clock: Clock;
  consumerId?: string;
}

/**
 * Decides when a draw is due, requests randomness for it and closes the
 * cycle when the provider calls back.
 *
 * performUpkeep and rawFulfillRandomWords run under one exclusive lock so a
 * request and its fulfillment never interleave with each other.
 */
export class UpkeepCoordinator implements RandomnessConsumer {
  readonly consumerId: string;
  private pendingRequestId: bigint | null = null;
  private readonly lock = new ExclusiveLock("raffle-upkeep");
  private readonly ledger: RaffleLedger;
  private readonly events: RaffleEventLog;
  private readonly provider: RandomnessProvider;
  private readonly paymentRail: PaymentRail;
  private readonly clock: Clock;

  constructor(deps: UpkeepCoordinatorDeps) {
    this.ledger = deps.ledger;
    this.events = deps.events;
    this.provider = deps.provider;
    this.paymentRail = deps.paymentRail;
    this.clock = deps.clock;
    this.consumerId = deps.consumerId ?? "raffle";
  }

  /**
   * Read-only. The performData argument is accepted for interface parity
   * with keepers and not interpreted.
   */
  checkUpkeep(_performData: string = "0x"): UpkeepCheckResult {
    const now = this.clock.now();
    const checks: UpkeepChecks = {
      isOpen: this.ledger.getRaffleState() === RaffleState.OPEN,
      timePassed:
        now - this.ledger.getLatestTimestamp() > this.ledger.getInterval(),
      hasPlayers: this.ledger.getNumberOfPlayers() > 0,
      hasBalance: this.ledger.getPooledBalance() > 0n,
    };

    const failed = CHECK_ORDER.filter((key) => !checks[key])
      .map((key) => CHECK_REASONS[key]);

    return {
      upkeepNeeded: failed.length === 0,
      performData:
        failed.length === 0
          ? "0x"
          : ethers.hexlify(ethers.toUtf8Bytes(failed.join(","))),
      checks,
    };
  }

  /**
   * Start a draw. The trigger is evaluated again here; whatever the caller
   * saw in checkUpkeep is not trusted.
   */
  async performUpkeep(
    performData: string = "0x",
    signal?: AbortSignal
  ): Promise<bigint> {
    return withLock(this.lock, async () => {
      const { upkeepNeeded } = this.checkUpkeep(performData);
      if (!upkeepNeeded) {
        throw new UpkeepNotNeededError(
          this.ledger.getPooledBalance(),
          this.ledger.getNumberOfPlayers(),
          this.ledger.getRaffleState()
        );
      }

      this.ledger.markCalculating();

      const { config } = this.ledger;
      let requestId: bigint;
      try {
        requestId = await this.provider.requestRandomWords(
          this,
          {
            keyHash: config.keyHash,
            subscriptionId: config.subscriptionId,
            requestConfirmations: config.requestConfirmations,
            callbackGasLimit: config.callbackGasLimit,
            numWords: config.numWords,
          },
          signal
        );
      } catch (err) {
        this.ledger.reopen();
        console.error(
          `❌ [UPKEEP] ${this.provider.name} rejected randomness request; raffle reopened:`,
          err instanceof Error ? err.message : err
        );
        throw err;
      }

      this.pendingRequestId = requestId;
      console.log(
        `🎲 [UPKEEP] Draw requested from ${this.provider.name} (requestId: ${requestId}, players: ${this.ledger.getNumberOfPlayers()})`
      );
      this.events.emit({
        type: "DrawRequested",
        requestId,
        timestamp: this.clock.now(),
      });
      return requestId;
    });
  }

  /**
   * Provider callback. Deliveries that do not match the pending request are
   * ignored without touching state, since providers may replay or delay them.
   * The cycle is only closed after the payout succeeded; a failed payout
   * leaves the raffle CALCULATING with its entrants intact.
   */
  async rawFulfillRandomWords(
    requestId: bigint,
    randomWords: bigint[]
  ): Promise<FulfillmentOutcome> {
    return withLock<FulfillmentOutcome>(this.lock, async () => {
      if (this.ledger.getRaffleState() !== RaffleState.CALCULATING) {
        return this.ignore(requestId, "not-calculating");
      }
      if (this.pendingRequestId === null || requestId !== this.pendingRequestId) {
        return this.ignore(requestId, "unknown-request");
      }
      if (randomWords.length === 0) {
        return this.ignore(requestId, "no-random-words");
      }
      const randomWord = randomWords[0];
      if (randomWord < 0n) {
        return this.ignore(requestId, "invalid-random-word");
      }

      // Entries are closed while CALCULATING, so this equals the count at request time.
      const numPlayers = this.ledger.getNumberOfPlayers();
      if (numPlayers === 0) {
        return this.ignore(requestId, "no-players");
      }

      const winnerIndex = Number(randomWord % BigInt(numPlayers));
      const winner = this.ledger.getPlayer(winnerIndex);
      const prize = this.ledger.getPooledBalance();

      try {
        await this.paymentRail.transfer(winner, prize);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        console.error(
          `❌ [PAYOUT] Transfer of ${prize} to ${winner} failed; cycle left CALCULATING (requestId: ${requestId}):`,
          reason
        );
        throw new PayoutTransferFailedError(winner, prize, reason);
      }

      const completedAt = this.clock.now();
      this.ledger.completeCycle(winner, completedAt);
      this.pendingRequestId = null;

      console.log(
        `🏆 [UPKEEP] Winner ${winner} (index ${winnerIndex} of ${numPlayers}) paid ${prize} for request ${requestId}`
      );
      this.events.emit({
        type: "WinnerPicked",
        winner,
        requestId,
        prize,
        randomWord,
        numPlayers,
        timestamp: completedAt,
      });

      return {
        status: "completed",
        requestId,
        winner,
        winnerIndex,
        prize,
        randomWord,
        numPlayers,
        completedAt,
      };
    });
  }

  getPendingRequestId(): bigint | null {
    return this.pendingRequestId;
  }

  /** Re-attach a request that was in flight when the state was persisted. */
  restorePendingRequest(requestId: bigint | null): void {
    this.pendingRequestId = requestId;
  }

  private ignore(
    requestId: bigint,
    reason: FulfillmentIgnoredReason
  ): FulfillmentOutcome {
    console.warn(
      `⚠️ [UPKEEP] Ignoring fulfillment for request ${requestId}: ${reason} (pending: ${
        this.pendingRequestId ?? "none"
      }, state: ${this.ledger.getRaffleState()})`
    );
    return { status: "ignored", requestId, reason };
  }
}
