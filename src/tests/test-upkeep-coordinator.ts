import { RaffleState } from "../types/raffle";
import { decodePerformData } from "../services/upkeepCoordinator";
import { createRaffle } from "../services/raffle";
import { InMemoryPaymentRail } from "../services/paymentRail";
import { ManualClock } from "../utils/clock";
import {
  PayoutTransferFailedError,
  UpkeepNotNeededError,
} from "../utils/raffleErrors";
import {
  KEY_HASH,
  PLAYER_1,
  PLAYER_2,
  PLAYER_3,
  START_TIME,
  StubRandomnessProvider,
  TestRaffle,
  createTestRaffle,
  fillAndElapse,
  testConfig,
} from "./fixtures";

describe("UpkeepCoordinator.checkUpkeep", () => {
  it("is not needed on a fresh raffle and names every failed check", () => {
    const { raffle } = createTestRaffle();

    const result = raffle.coordinator.checkUpkeep();

    expect(result.upkeepNeeded).toBe(false);
    expect(result.checks).toEqual({
      isOpen: true,
      timePassed: false,
      hasPlayers: false,
      hasBalance: false,
    });
    expect(decodePerformData(result.performData)).toEqual([
      "interval-not-elapsed",
      "no-players",
      "no-balance",
    ]);
  });

  it("returns 0x performData when upkeep is due", () => {
    const t = createTestRaffle();
    fillAndElapse(t);

    const result = t.raffle.coordinator.checkUpkeep("0xdeadbeef");

    expect(result.upkeepNeeded).toBe(true);
    expect(result.performData).toBe("0x");
    expect(decodePerformData(result.performData)).toEqual([]);
  });

  it("requires strictly more than the interval to have passed", () => {
    const { raffle, clock } = createTestRaffle();
    raffle.ledger.enterRaffle(PLAYER_1, 100n);

    clock.advance(30);
    expect(raffle.coordinator.checkUpkeep().checks.timePassed).toBe(false);

    clock.advance(1);
    expect(raffle.coordinator.checkUpkeep().upkeepNeeded).toBe(true);
  });

  it("is not needed without players even after the interval", () => {
    const { raffle, clock } = createTestRaffle();
    clock.advance(31);

    const result = raffle.coordinator.checkUpkeep();

    expect(result.upkeepNeeded).toBe(false);
    expect(decodePerformData(result.performData)).toEqual(["no-players", "no-balance"]);
  });

  it("is not needed with players but an empty pool", () => {
    const { raffle, clock } = createTestRaffle({ entranceFee: 0n });
    raffle.ledger.enterRaffle(PLAYER_1, 0n);
    clock.advance(31);

    const result = raffle.coordinator.checkUpkeep();

    expect(result.upkeepNeeded).toBe(false);
    expect(decodePerformData(result.performData)).toEqual(["no-balance"]);
  });

  it("is not needed while calculating", async () => {
    const t = createTestRaffle();
    fillAndElapse(t);
    await t.raffle.coordinator.performUpkeep("0x");

    const result = t.raffle.coordinator.checkUpkeep();

    expect(result.upkeepNeeded).toBe(false);
    expect(decodePerformData(result.performData)).toEqual(["raffle-not-open"]);
  });

  it("does not mutate anything", () => {
    const t = createTestRaffle();
    fillAndElapse(t);

    t.raffle.coordinator.checkUpkeep();

    expect(t.raffle.ledger.getRaffleState()).toBe(RaffleState.OPEN);
    expect(t.provider.requests).toHaveLength(0);
    expect(t.raffle.events.list("DrawRequested")).toHaveLength(0);
  });
});

describe("UpkeepCoordinator.performUpkeep", () => {
  it("requests one word with the configured routing and closes entries", async () => {
    const t = createTestRaffle();
    fillAndElapse(t);

    const requestId = await t.raffle.coordinator.performUpkeep("0x");

    expect(requestId).toBe(1n);
    expect(t.raffle.ledger.getRaffleState()).toBe(RaffleState.CALCULATING);
    expect(t.raffle.coordinator.getPendingRequestId()).toBe(1n);
    expect(t.provider.requests).toEqual([
      {
        keyHash: KEY_HASH,
        subscriptionId: 1n,
        requestConfirmations: 3,
        callbackGasLimit: 500_000,
        numWords: 1,
      },
    ]);
    expect(t.raffle.events.list("DrawRequested")).toEqual([
      { type: "DrawRequested", requestId: 1n, timestamp: START_TIME + 31 },
    ]);
  });

  it("fails with UpkeepNotNeeded carrying balance, players and state", async () => {
    const { raffle } = createTestRaffle();
    raffle.ledger.enterRaffle(PLAYER_1, 100n);

    const attempt = raffle.coordinator.performUpkeep("0x");

    await expect(attempt).rejects.toBeInstanceOf(UpkeepNotNeededError);
    await expect(attempt).rejects.toMatchObject({
      code: "UPKEEP_NOT_NEEDED",
      balance: 100n,
      numPlayers: 1,
      raffleState: RaffleState.OPEN,
    });
    expect(raffle.ledger.getRaffleState()).toBe(RaffleState.OPEN);
  });

  it("ignores the performData payload it is given", async () => {
    const { raffle } = createTestRaffle();
    const stale = "0x"; // claims "due" but nothing is due

    await expect(raffle.coordinator.performUpkeep(stale)).rejects.toBeInstanceOf(
      UpkeepNotNeededError
    );
  });

  it("rejects a second request while one is pending", async () => {
    const t = createTestRaffle();
    fillAndElapse(t);
    await t.raffle.coordinator.performUpkeep("0x");

    await expect(t.raffle.coordinator.performUpkeep("0x")).rejects.toMatchObject({
      balance: 300n,
      numPlayers: 3,
      raffleState: RaffleState.CALCULATING,
    });
    expect(t.provider.requests).toHaveLength(1);
  });

  it("lets only one of two concurrent calls through", async () => {
    const t = createTestRaffle();
    fillAndElapse(t);

    const results = await Promise.allSettled([
      t.raffle.coordinator.performUpkeep("0x"),
      t.raffle.coordinator.performUpkeep("0x"),
    ]);

    expect(results[0]).toEqual({ status: "fulfilled", value: 1n });
    expect(results[1].status).toBe("rejected");
    expect(t.provider.requests).toHaveLength(1);
  });

  it("reopens the raffle when the provider rejects the request", async () => {
    const t = createTestRaffle();
    fillAndElapse(t);
    t.provider.failWith = new Error("oracle down");

    await expect(t.raffle.coordinator.performUpkeep("0x")).rejects.toThrow("oracle down");

    expect(t.raffle.ledger.getRaffleState()).toBe(RaffleState.OPEN);
    expect(t.raffle.coordinator.getPendingRequestId()).toBeNull();
    expect(t.raffle.events.list("DrawRequested")).toHaveLength(0);
    expect(t.raffle.coordinator.checkUpkeep().upkeepNeeded).toBe(true);
  });
});

describe("UpkeepCoordinator.rawFulfillRandomWords", () => {
  it("pays the whole pool to entrant word mod count and resets the cycle", async () => {
    const t = createTestRaffle();
    fillAndElapse(t);
    const requestId = await t.raffle.coordinator.performUpkeep("0x");
    t.clock.advance(5);

    const outcome = await t.raffle.coordinator.rawFulfillRandomWords(requestId, [7n]);

    expect(outcome).toEqual({
      status: "completed",
      requestId: 1n,
      winner: PLAYER_2,
      winnerIndex: 1,
      prize: 300n,
      randomWord: 7n,
      numPlayers: 3,
      completedAt: START_TIME + 36,
    });
    expect(t.rail.balanceOf(PLAYER_2)).toBe(300n);
    expect(t.raffle.ledger.getRecentWinner()).toBe(PLAYER_2);
    expect(t.raffle.ledger.getNumberOfPlayers()).toBe(0);
    expect(t.raffle.ledger.getPooledBalance()).toBe(0n);
    expect(t.raffle.ledger.getRaffleState()).toBe(RaffleState.OPEN);
    expect(t.raffle.ledger.getLatestTimestamp()).toBe(START_TIME + 36);
    expect(t.raffle.coordinator.getPendingRequestId()).toBeNull();
    expect(t.raffle.events.list().map((e) => e.type)).toEqual([
      "Entered",
      "Entered",
      "Entered",
      "DrawRequested",
      "WinnerPicked",
    ]);
    expect(t.raffle.events.list("WinnerPicked")).toEqual([
      {
        type: "WinnerPicked",
        winner: PLAYER_2,
        requestId: 1n,
        prize: 300n,
        randomWord: 7n,
        numPlayers: 3,
        timestamp: START_TIME + 36,
      },
    ]);
  });

  it("reduces words larger than the entrant count", async () => {
    const t = createTestRaffle();
    fillAndElapse(t);
    await t.raffle.coordinator.performUpkeep("0x");
    const word = 2n ** 255n + 2n; // 2^255 ≡ 2 (mod 3), so the word ≡ 1

    const outcome = await t.raffle.coordinator.rawFulfillRandomWords(1n, [word]);

    expect(outcome).toMatchObject({ status: "completed", winnerIndex: 1, winner: PLAYER_2 });
  });

  it("uses only the first word", async () => {
    const t = createTestRaffle();
    fillAndElapse(t);
    await t.raffle.coordinator.performUpkeep("0x");

    const outcome = await t.raffle.coordinator.rawFulfillRandomWords(1n, [2n, 0n]);

    expect(outcome).toMatchObject({ winner: PLAYER_3, winnerIndex: 2 });
  });

  it("ignores a fulfillment when no draw is pending", async () => {
    const { raffle } = createTestRaffle();
    raffle.ledger.enterRaffle(PLAYER_1, 100n);

    const outcome = await raffle.coordinator.rawFulfillRandomWords(1n, [7n]);

    expect(outcome).toEqual({ status: "ignored", requestId: 1n, reason: "not-calculating" });
    expect(raffle.ledger.getNumberOfPlayers()).toBe(1);
  });

  it("ignores a fulfillment for another request id", async () => {
    const t = createTestRaffle();
    fillAndElapse(t);
    await t.raffle.coordinator.performUpkeep("0x");

    const outcome = await t.raffle.coordinator.rawFulfillRandomWords(99n, [7n]);

    expect(outcome).toEqual({ status: "ignored", requestId: 99n, reason: "unknown-request" });
    expect(t.raffle.ledger.getRaffleState()).toBe(RaffleState.CALCULATING);
    expect(t.raffle.coordinator.getPendingRequestId()).toBe(1n);
    expect(t.rail.history()).toEqual([]);
  });

  it("ignores an empty word list and a negative word", async () => {
    const t = createTestRaffle();
    fillAndElapse(t);
    await t.raffle.coordinator.performUpkeep("0x");

    await expect(t.raffle.coordinator.rawFulfillRandomWords(1n, [])).resolves.toMatchObject({
      status: "ignored",
      reason: "no-random-words",
    });
    await expect(t.raffle.coordinator.rawFulfillRandomWords(1n, [-1n])).resolves.toMatchObject({
      status: "ignored",
      reason: "invalid-random-word",
    });
    expect(t.raffle.ledger.getNumberOfPlayers()).toBe(3);
  });

  it("ignores a replay of an already fulfilled request", async () => {
    const t = createTestRaffle();
    fillAndElapse(t);
    await t.raffle.coordinator.performUpkeep("0x");
    await t.raffle.coordinator.rawFulfillRandomWords(1n, [7n]);

    const replay = await t.raffle.coordinator.rawFulfillRandomWords(1n, [0n]);

    expect(replay).toMatchObject({ status: "ignored", reason: "not-calculating" });
    expect(t.raffle.ledger.getRecentWinner()).toBe(PLAYER_2);
    expect(t.rail.history()).toHaveLength(1);
  });

  it("leaves the cycle untouched when the payout fails, and completes on a later delivery", async () => {
    const t = createTestRaffle();
    fillAndElapse(t);
    await t.raffle.coordinator.performUpkeep("0x");
    t.rail.refuse(PLAYER_2);

    const attempt = t.raffle.coordinator.rawFulfillRandomWords(1n, [7n]);

    await expect(attempt).rejects.toBeInstanceOf(PayoutTransferFailedError);
    await expect(attempt).rejects.toMatchObject({
      code: "PAYOUT_TRANSFER_FAILED",
      statusCode: 502,
      details: {
        winner: PLAYER_2,
        amount: "300",
        reason: `Transfer to ${PLAYER_2} rejected: recipient refuses funds`,
      },
    });
    expect(t.raffle.ledger.getRaffleState()).toBe(RaffleState.CALCULATING);
    expect(t.raffle.ledger.getPlayers()).toEqual([PLAYER_1, PLAYER_2, PLAYER_3]);
    expect(t.raffle.ledger.getPooledBalance()).toBe(300n);
    expect(t.raffle.ledger.getRecentWinner()).toBeNull();
    expect(t.raffle.coordinator.getPendingRequestId()).toBe(1n);
    expect(t.raffle.events.list("WinnerPicked")).toHaveLength(0);

    t.rail.accept(PLAYER_2);
    const retry = await t.raffle.coordinator.rawFulfillRandomWords(1n, [7n]);

    expect(retry).toMatchObject({ status: "completed", winner: PLAYER_2, prize: 300n });
    expect(t.rail.balanceOf(PLAYER_2)).toBe(300n);
  });

  it("runs a second cycle after the first one completes", async () => {
    const t = createTestRaffle();
    fillAndElapse(t);
    await t.raffle.coordinator.performUpkeep("0x");
    await t.raffle.coordinator.rawFulfillRandomWords(1n, [7n]);

    t.raffle.ledger.enterRaffle(PLAYER_3, 100n);
    expect(t.raffle.coordinator.checkUpkeep().upkeepNeeded).toBe(false);
    t.clock.advance(31);

    const second = await t.raffle.coordinator.performUpkeep("0x");
    const outcome = await t.raffle.coordinator.rawFulfillRandomWords(second, [12345n]);

    expect(second).toBe(2n);
    expect(outcome).toMatchObject({ status: "completed", winner: PLAYER_3, prize: 100n });
    expect(t.rail.balanceOf(PLAYER_3)).toBe(100n);
  });

  it("keeps the event history bounded across many cycles", async () => {
    const clock = new ManualClock(START_TIME);
    const provider = new StubRandomnessProvider();
    const rail = new InMemoryPaymentRail();
    const raffle = createRaffle({
      config: testConfig(),
      provider,
      paymentRail: rail,
      clock,
      maxEventHistory: 5,
    });
    const t: TestRaffle = { raffle, clock, provider, rail };

    for (let cycle = 1n; cycle <= 3n; cycle++) {
      fillAndElapse(t);
      const requestId = await t.raffle.coordinator.performUpkeep("0x");
      await t.raffle.coordinator.rawFulfillRandomWords(requestId, [7n]);
    }

    expect(t.raffle.events.size).toBe(5);
    expect(t.raffle.events.list().map((e) => e.type)).toEqual([
      "Entered",
      "Entered",
      "Entered",
      "DrawRequested",
      "WinnerPicked",
    ]);
    expect(t.raffle.events.list("WinnerPicked")).toMatchObject([{ requestId: 3n }]);
    expect(t.rail.history()).toHaveLength(3);
  });
});
