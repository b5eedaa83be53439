import { RaffleConfig, RandomWordsRequest } from "../types/raffle";
import { ManualClock } from "../utils/clock";
import { Raffle, createRaffle } from "../services/raffle";
import { RandomnessConsumer, RandomnessProvider } from "../services/randomnessProvider";
import { InMemoryPaymentRail } from "../services/paymentRail";

// All-digit addresses are their own EIP-55 checksum form.
export const PLAYER_1 = "0x1111111111111111111111111111111111111111";
export const PLAYER_2 = "0x2222222222222222222222222222222222222222";
export const PLAYER_3 = "0x3333333333333333333333333333333333333333";

export const KEY_HASH = "0x" + "ab".repeat(32);
export const START_TIME = 1_700_000_000;

export function testConfig(overrides: Partial<RaffleConfig> = {}): RaffleConfig {
  return {
    entranceFee: 100n,
    interval: 30,
    keyHash: KEY_HASH,
    subscriptionId: 1n,
    requestConfirmations: 3,
    callbackGasLimit: 500_000,
    numWords: 1,
    ...overrides,
  };
}

/**
 * Records requests and hands out ids 1, 2, 3...; can be told to fail, or to
 * take delayMs before accepting (cut short by the abort signal).
 */
export class StubRandomnessProvider implements RandomnessProvider {
  readonly name = "StubRandomnessProvider";
  readonly requests: RandomWordsRequest[] = [];
  failWith: Error | null = null;
  delayMs = 0;
  private nextId = 1n;

  async requestRandomWords(
    _consumer: RandomnessConsumer,
    request: RandomWordsRequest,
    signal?: AbortSignal
  ): Promise<bigint> {
    if (this.failWith) throw this.failWith;
    if (this.delayMs > 0) await wait(this.delayMs, signal);
    this.requests.push(request);
    return this.nextId++;
  }
}

export interface TestRaffle {
  raffle: Raffle;
  clock: ManualClock;
  provider: StubRandomnessProvider;
  rail: InMemoryPaymentRail;
}

export function createTestRaffle(overrides: Partial<RaffleConfig> = {}): TestRaffle {
  const clock = new ManualClock(START_TIME);
  const provider = new StubRandomnessProvider();
  const rail = new InMemoryPaymentRail();
  const raffle = createRaffle({
    config: testConfig(overrides),
    provider,
    paymentRail: rail,
    clock,
  });
  return { raffle, clock, provider, rail };
}

/** Three entrants at the fee, interval elapsed: the next performUpkeep succeeds. */
export function fillAndElapse({ raffle, clock }: TestRaffle): void {
  raffle.ledger.enterRaffle(PLAYER_1, 100n);
  raffle.ledger.enterRaffle(PLAYER_2, 100n);
  raffle.ledger.enterRaffle(PLAYER_3, 100n);
  clock.advance(31);
}

/** Let pending promise chains (listener saves) settle. */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

function wait(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener("abort", () => {
      clearTimeout(timer);
      reject(new Error("request aborted"));
    });
  });
}
