import { ethers } from "ethers";
import { RaffleState } from "../types/raffle";
import { createRaffle } from "../services/raffle";
import {
  MOCK_BASE_FEE,
  MOCK_GAS_PRICE_LINK,
  MockVrfCoordinator,
  MockVrfError,
} from "../services/mockVrfCoordinator";
import { InMemoryPaymentRail } from "../services/paymentRail";
import { ManualClock } from "../utils/clock";
import {
  PLAYER_1,
  PLAYER_2,
  PLAYER_3,
  START_TIME,
  testConfig,
} from "./fixtures";

const FEE_PER_REQUEST = 250_000_000_000_000_000n + 1_000_000_000n * 500_000n;

function deployWithMock(fund: bigint = ethers.parseEther("1000")) {
  const mock = new MockVrfCoordinator();
  const subscriptionId = mock.createSubscription();
  mock.fundSubscription(subscriptionId, fund);

  const clock = new ManualClock(START_TIME);
  const rail = new InMemoryPaymentRail();
  const raffle = createRaffle({
    config: testConfig({ subscriptionId }),
    provider: mock,
    paymentRail: rail,
    clock,
  });
  mock.addConsumer(subscriptionId, raffle.coordinator);

  raffle.ledger.enterRaffle(PLAYER_1, 100n);
  raffle.ledger.enterRaffle(PLAYER_2, 100n);
  raffle.ledger.enterRaffle(PLAYER_3, 100n);
  clock.advance(31);

  return { mock, subscriptionId, raffle, rail };
}

async function rejectionOf(promise: Promise<unknown>): Promise<MockVrfError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof MockVrfError) return err;
    throw err;
  }
  throw new Error("expected a MockVrfError");
}

describe("MockVrfCoordinator", () => {
  it("uses the local network fee defaults", () => {
    expect(MOCK_BASE_FEE).toBe(250_000_000_000_000_000n);
    expect(MOCK_GAS_PRICE_LINK).toBe(1_000_000_000n);
  });

  it("numbers subscriptions from 1 and tracks balance and consumers", () => {
    const mock = new MockVrfCoordinator();

    expect(mock.createSubscription()).toBe(1n);
    expect(mock.createSubscription()).toBe(2n);

    mock.fundSubscription(2n, 500n);
    mock.fundSubscription(2n, 250n);
    expect(mock.getSubscription(2n)).toEqual({ id: 2n, balance: 750n, consumers: [] });
  });

  it("refuses requests from unknown subscriptions and consumers", async () => {
    const mock = new MockVrfCoordinator();
    const raffle = createRaffle({
      config: testConfig({ subscriptionId: 1n }),
      provider: mock,
      paymentRail: new InMemoryPaymentRail(),
    });
    const request = {
      keyHash: raffle.config.keyHash,
      subscriptionId: 1n,
      requestConfirmations: 3,
      callbackGasLimit: 500_000,
      numWords: 1,
    };

    expect((await rejectionOf(mock.requestRandomWords(raffle.coordinator, request))).reason).toBe(
      "InvalidSubscription"
    );

    mock.createSubscription();
    expect((await rejectionOf(mock.requestRandomWords(raffle.coordinator, request))).reason).toBe(
      "InvalidConsumer"
    );
  });

  it("removes consumers and rejects removing one that is not there", () => {
    const { mock, subscriptionId } = deployWithMock();

    mock.removeConsumer(subscriptionId, "raffle");

    expect(mock.getSubscription(subscriptionId).consumers).toEqual([]);
    expect(() => mock.removeConsumer(subscriptionId, "raffle")).toThrow(MockVrfError);
  });

  it("delivers keccak-derived words, charges the subscription and completes the draw", async () => {
    const { mock, subscriptionId, raffle, rail } = deployWithMock();

    const requestId = await raffle.coordinator.performUpkeep("0x");
    expect(requestId).toBe(1n);
    expect(mock.pendingRequestExists(1n)).toBe(true);

    const result = await mock.fulfillRandomWords(requestId, raffle.coordinator.consumerId);

    const expectedWord = BigInt(
      ethers.keccak256(
        ethers.AbiCoder.defaultAbiCoder().encode(["uint256", "uint256"], [1n, 0n])
      )
    );
    const expectedWinner = [PLAYER_1, PLAYER_2, PLAYER_3][Number(expectedWord % 3n)];

    expect(result).toEqual({
      requestId: 1n,
      payment: FEE_PER_REQUEST,
      success: true,
      randomWords: [expectedWord],
    });
    expect(mock.getSubscription(subscriptionId).balance).toBe(
      ethers.parseEther("1000") - FEE_PER_REQUEST
    );
    expect(mock.pendingRequestExists(1n)).toBe(false);
    expect(raffle.ledger.getRecentWinner()).toBe(expectedWinner);
    expect(rail.balanceOf(expectedWinner)).toBe(300n);
  });

  it("logs the request routing", async () => {
    const { mock, raffle } = deployWithMock();

    await raffle.coordinator.performUpkeep("0x");

    const requested = mock.getLogs().find((entry) => entry.event === "RandomWordsRequested");
    expect(requested?.args).toEqual({
      keyHash: raffle.config.keyHash,
      requestId: "1",
      subId: "1",
      minimumRequestConfirmations: "3",
      callbackGasLimit: "500000",
      numWords: "1",
      sender: "raffle",
    });
  });

  it("delivers caller-supplied words with fulfillRandomWordsWithOverride", async () => {
    const { mock, raffle, rail } = deployWithMock();
    await raffle.coordinator.performUpkeep("0x");

    const result = await mock.fulfillRandomWordsWithOverride(1n, "raffle", [7n]);

    expect(result.success).toBe(true);
    expect(raffle.ledger.getRecentWinner()).toBe(PLAYER_2);
    expect(rail.balanceOf(PLAYER_2)).toBe(300n);
  });

  it("rejects an override with the wrong number of words", async () => {
    const { mock, raffle } = deployWithMock();
    await raffle.coordinator.performUpkeep("0x");

    const err = await rejectionOf(mock.fulfillRandomWordsWithOverride(1n, "raffle", [1n, 2n]));

    expect(err.reason).toBe("InvalidRandomWords");
    expect(mock.pendingRequestExists(1n)).toBe(true);
  });

  it("reports nonexistent request for unknown and already fulfilled ids", async () => {
    const { mock, raffle } = deployWithMock();

    expect((await rejectionOf(mock.fulfillRandomWords(1n, "raffle"))).reason).toBe(
      "nonexistent request"
    );

    await raffle.coordinator.performUpkeep("0x");
    await mock.fulfillRandomWords(1n, "raffle");

    const err = await rejectionOf(mock.fulfillRandomWords(1n, "raffle"));
    expect(err.reason).toBe("nonexistent request");
    expect(err.message).toBe("nonexistent request 1");
  });

  it("rejects delivery to a consumer that does not own the request", async () => {
    const { mock, raffle } = deployWithMock();
    await raffle.coordinator.performUpkeep("0x");

    expect((await rejectionOf(mock.fulfillRandomWords(1n, "someone-else"))).reason).toBe(
      "InvalidConsumer"
    );
  });

  it("refuses to fulfil from an underfunded subscription and keeps the request", async () => {
    const { mock, raffle } = deployWithMock(FEE_PER_REQUEST - 1n);
    await raffle.coordinator.performUpkeep("0x");

    const err = await rejectionOf(mock.fulfillRandomWords(1n, "raffle"));

    expect(err.reason).toBe("InsufficientBalance");
    expect(mock.pendingRequestExists(1n)).toBe(true);
    expect(raffle.ledger.getRaffleState()).toBe(RaffleState.CALCULATING);
  });

  it("reports success=false when the consumer's payout fails", async () => {
    const { mock, raffle, rail } = deployWithMock();
    await raffle.coordinator.performUpkeep("0x");
    rail.refuse(PLAYER_2);

    const result = await mock.fulfillRandomWordsWithOverride(1n, "raffle", [7n]);

    expect(result.success).toBe(false);
    expect(raffle.ledger.getRaffleState()).toBe(RaffleState.CALCULATING);
    expect(raffle.ledger.getNumberOfPlayers()).toBe(3);
    const logs = mock.getLogs();
    expect(logs[logs.length - 1]).toEqual({
      event: "RandomWordsFulfilled",
      args: {
        requestId: "1",
        outputSeed: "1",
        payment: FEE_PER_REQUEST.toString(),
        success: false,
      },
    });
  });
});
