export enum RaffleState {
  OPEN = "OPEN",
  CALCULATING = "CALCULATING",
}

/** Immutable per-raffle configuration. Amounts are in the smallest unit (wei). */
export interface RaffleConfig {
  entranceFee: bigint;
  /** Seconds that must pass since the last draw before a new one is due. */
  interval: number;
  /** Randomness provider lane (gas lane / key hash), 32-byte hex. */
  keyHash: string;
  subscriptionId: bigint;
  requestConfirmations: number;
  callbackGasLimit: number;
  numWords: 1;
}

export interface RandomWordsRequest {
  keyHash: string;
  subscriptionId: bigint;
  requestConfirmations: number;
  callbackGasLimit: number;
  numWords: number;
}

export interface UpkeepChecks {
  isOpen: boolean;
  timePassed: boolean;
  hasPlayers: boolean;
  hasBalance: boolean;
}

export interface UpkeepCheckResult {
  upkeepNeeded: boolean;
  /** Opaque hex payload handed back to performUpkeep. */
  performData: string;
  checks: UpkeepChecks;
}

export type FulfillmentIgnoredReason =
  | "not-calculating"
  | "unknown-request"
  | "no-random-words"
  | "invalid-random-word"
  | "no-players";

export type FulfillmentOutcome =
  | {
      status: "ignored";
      requestId: bigint;
      reason: FulfillmentIgnoredReason;
    }
  | {
      status: "completed";
      requestId: bigint;
      winner: string;
      winnerIndex: number;
      prize: bigint;
      randomWord: bigint;
      numPlayers: number;
      completedAt: number;
    };

// Event Types
export interface EnteredEvent {
  type: "Entered";
  participant: string;
  amount: bigint;
  timestamp: number;
}

export interface DrawRequestedEvent {
  type: "DrawRequested";
  requestId: bigint;
  timestamp: number;
}

export interface WinnerPickedEvent {
  type: "WinnerPicked";
  winner: string;
  requestId: bigint;
  prize: bigint;
  randomWord: bigint;
  numPlayers: number;
  timestamp: number;
}

export type RaffleEvent = EnteredEvent | DrawRequestedEvent | WinnerPickedEvent;
export type RaffleEventType = RaffleEvent["type"];

/** Serialisable state of the active cycle (bigints as decimal strings). */
export interface RaffleSnapshot {
  state: RaffleState;
  players: string[];
  pooledBalance: string;
  lastTimestamp: number;
  recentWinner: string | null;
  pendingRequestId: string | null;
}

/** Winner history row (raffle_winners table) */
export interface RaffleWinner {
  id: number;
  request_id: string;
  winner_address: string;
  prize_amount: string;
  random_word: string;
  num_players: number;
  drawn_at: Date;
}

export interface RecordWinnerInput {
  requestId: bigint;
  winner: string;
  prize: bigint;
  randomWord: bigint;
  numPlayers: number;
  drawnAt: Date;
}
