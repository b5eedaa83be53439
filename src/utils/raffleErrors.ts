import { RaffleState } from "../types/raffle";

/**
 * Base class for failures the raffle surfaces to its callers.
 * `statusCode` is the HTTP status the API answers with.
 */
export class RaffleError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly details: Record<string, unknown>;

  constructor(params: {
    code: string;
    statusCode: number;
    message: string;
    details?: Record<string, unknown>;
  }) {
    super(params.message);
    this.name = "RaffleError";
    this.code = params.code;
    this.statusCode = params.statusCode;
    this.details = params.details ?? {};
  }
}

export class InsufficientStakeError extends RaffleError {
  constructor(amount: bigint, entranceFee: bigint) {
    super({
      code: "INSUFFICIENT_STAKE",
      statusCode: 400,
      message: `Entry of ${amount} is below the entrance fee of ${entranceFee}`,
      details: {
        amount: amount.toString(),
        entranceFee: entranceFee.toString(),
      },
    });
    this.name = "InsufficientStakeError";
  }
}

export class NotOpenError extends RaffleError {
  constructor(state: RaffleState) {
    super({
      code: "NOT_OPEN",
      statusCode: 409,
      message: `Raffle is not accepting entries (state: ${state})`,
      details: { raffleState: state },
    });
    this.name = "NotOpenError";
  }
}

export class InvalidParticipantError extends RaffleError {
  constructor(participant: string) {
    super({
      code: "INVALID_PARTICIPANT",
      statusCode: 400,
      message: `Participant must be a 0x address, got "${participant}"`,
      details: { participant },
    });
    this.name = "InvalidParticipantError";
  }
}

export class IndexOutOfRangeError extends RaffleError {
  constructor(index: number, numPlayers: number) {
    super({
      code: "INDEX_OUT_OF_RANGE",
      statusCode: 404,
      message: `No player at index ${index} (${numPlayers} players)`,
      details: { index, numPlayers },
    });
    this.name = "IndexOutOfRangeError";
  }
}

export class UpkeepNotNeededError extends RaffleError {
  readonly balance: bigint;
  readonly numPlayers: number;
  readonly raffleState: RaffleState;

  constructor(balance: bigint, numPlayers: number, raffleState: RaffleState) {
    super({
      code: "UPKEEP_NOT_NEEDED",
      statusCode: 409,
      message: `Upkeep not needed (balance: ${balance}, players: ${numPlayers}, state: ${raffleState})`,
      details: {
        balance: balance.toString(),
        numPlayers,
        raffleState,
      },
    });
    this.name = "UpkeepNotNeededError";
    this.balance = balance;
    this.numPlayers = numPlayers;
    this.raffleState = raffleState;
  }
}

export class PayoutTransferFailedError extends RaffleError {
  constructor(winner: string, amount: bigint, reason: string) {
    super({
      code: "PAYOUT_TRANSFER_FAILED",
      statusCode: 502,
      message: `Transfer of ${amount} to ${winner} failed: ${reason}`,
      details: { winner, amount: amount.toString(), reason },
    });
    this.name = "PayoutTransferFailedError";
  }
}

export class InvalidRaffleConfigError extends RaffleError {
  constructor(field: string, message: string) {
    super({
      code: "INVALID_RAFFLE_CONFIG",
      statusCode: 500,
      message: `Invalid raffle config "${field}": ${message}`,
      details: { field },
    });
    this.name = "InvalidRaffleConfigError";
  }
}
