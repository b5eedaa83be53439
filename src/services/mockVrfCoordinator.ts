import { ethers } from "ethers";
import { RandomWordsRequest } from "../types/raffle";
import { RandomnessConsumer, RandomnessProvider } from "./randomnessProvider";

/* ---------- Defaults for local networks ---------- */
export const MOCK_BASE_FEE = ethers.parseEther("0.25"); // 0.25 LINK per request
export const MOCK_GAS_PRICE_LINK = 1_000_000_000n; // LINK per gas

export class MockVrfError extends Error {
  constructor(readonly reason: string, message?: string) {
    super(message ?? reason);
    this.name = "MockVrfError";
  }
}

export interface MockSubscription {
  id: bigint;
  balance: bigint;
  consumers: string[];
}

export interface MockFulfillment {
  requestId: bigint;
  payment: bigint;
  success: boolean;
  randomWords: bigint[];
}

interface PendingRequest extends RandomWordsRequest {
  requestId: bigint;
  consumer: RandomnessConsumer;
}

interface MockLogEntry {
  event: "SubscriptionCreated" | "SubscriptionFunded" | "ConsumerAdded" | "ConsumerRemoved" | "RandomWordsRequested" | "RandomWordsFulfilled";
  args: Record<string, string | boolean>;
}

/**
 * In-process randomness coordinator for development networks.
 *
 * Mirrors the behaviour of the local VRF coordinator mock: subscriptions
 * pay a base fee plus gas for every fulfillment, requests are delivered
 * only when someone calls fulfillRandomWords, and a consumer that throws
 * does not fail the fulfillment (it is reported with success=false).
 */
export class MockVrfCoordinator implements RandomnessProvider {
  readonly name = "MockVrfCoordinator";
  private nextSubId = 1n;
  private nextRequestId = 1n;
  private readonly subscriptions = new Map<bigint, { balance: bigint; consumers: Map<string, RandomnessConsumer> }>();
  private readonly requests = new Map<bigint, PendingRequest>();
  private readonly logs: MockLogEntry[] = [];

  constructor(
    readonly baseFee: bigint = MOCK_BASE_FEE,
    readonly gasPriceLink: bigint = MOCK_GAS_PRICE_LINK
  ) {}

  createSubscription(): bigint {
    const subId = this.nextSubId++;
    this.subscriptions.set(subId, { balance: 0n, consumers: new Map() });
    this.log("SubscriptionCreated", { subId: subId.toString() });
    return subId;
  }

  fundSubscription(subId: bigint, amount: bigint): void {
    const sub = this.requireSubscription(subId);
    const oldBalance = sub.balance;
    sub.balance += amount;
    this.log("SubscriptionFunded", {
      subId: subId.toString(),
      oldBalance: oldBalance.toString(),
      newBalance: sub.balance.toString(),
    });
  }

  addConsumer(subId: bigint, consumer: RandomnessConsumer): void {
    const sub = this.requireSubscription(subId);
    sub.consumers.set(consumer.consumerId, consumer);
    this.log("ConsumerAdded", { subId: subId.toString(), consumer: consumer.consumerId });
  }

  removeConsumer(subId: bigint, consumerId: string): void {
    const sub = this.requireSubscription(subId);
    if (!sub.consumers.delete(consumerId)) {
      throw new MockVrfError("InvalidConsumer", `Consumer ${consumerId} is not on subscription ${subId}`);
    }
    this.log("ConsumerRemoved", { subId: subId.toString(), consumer: consumerId });
  }

  getSubscription(subId: bigint): MockSubscription {
    const sub = this.requireSubscription(subId);
    return { id: subId, balance: sub.balance, consumers: [...sub.consumers.keys()] };
  }

  pendingRequestExists(requestId: bigint): boolean {
    return this.requests.has(requestId);
  }

  async requestRandomWords(
    consumer: RandomnessConsumer,
    request: RandomWordsRequest
  ): Promise<bigint> {
    const sub = this.requireSubscription(request.subscriptionId);
    if (!sub.consumers.has(consumer.consumerId)) {
      throw new MockVrfError(
        "InvalidConsumer",
        `Consumer ${consumer.consumerId} is not on subscription ${request.subscriptionId}`
      );
    }

    const requestId = this.nextRequestId++;
    this.requests.set(requestId, { ...request, requestId, consumer });
    this.log("RandomWordsRequested", {
      keyHash: request.keyHash,
      requestId: requestId.toString(),
      subId: request.subscriptionId.toString(),
      minimumRequestConfirmations: String(request.requestConfirmations),
      callbackGasLimit: String(request.callbackGasLimit),
      numWords: String(request.numWords),
      sender: consumer.consumerId,
    });
    return requestId;
  }

  /** Deliver words derived from the request id: keccak256(abi.encode(requestId, i)). */
  async fulfillRandomWords(
    requestId: bigint,
    consumerId: string
  ): Promise<MockFulfillment> {
    const pending = this.requirePending(requestId, consumerId);
    const coder = ethers.AbiCoder.defaultAbiCoder();
    const words: bigint[] = [];
    for (let i = 0; i < pending.numWords; i++) {
      words.push(BigInt(ethers.keccak256(coder.encode(["uint256", "uint256"], [requestId, i]))));
    }
    return this.deliver(pending, words);
  }

  async fulfillRandomWordsWithOverride(
    requestId: bigint,
    consumerId: string,
    words: bigint[]
  ): Promise<MockFulfillment> {
    const pending = this.requirePending(requestId, consumerId);
    if (words.length !== pending.numWords) {
      throw new MockVrfError(
        "InvalidRandomWords",
        `Expected ${pending.numWords} random words, got ${words.length}`
      );
    }
    return this.deliver(pending, words);
  }

  getLogs(): MockLogEntry[] {
    return [...this.logs];
  }

  private async deliver(
    pending: PendingRequest,
    words: bigint[]
  ): Promise<MockFulfillment> {
    const sub = this.requireSubscription(pending.subscriptionId);
    const payment = this.baseFee + this.gasPriceLink * BigInt(pending.callbackGasLimit);
    if (sub.balance < payment) {
      throw new MockVrfError(
        "InsufficientBalance",
        `Subscription ${pending.subscriptionId} holds ${sub.balance}, fulfillment costs ${payment}`
      );
    }

    this.requests.delete(pending.requestId);

    let success = true;
    try {
      const outcome = await pending.consumer.rawFulfillRandomWords(pending.requestId, words);
      if (outcome.status === "ignored") {
        console.warn(`⚠️ [MOCK VRF] Consumer ignored request ${pending.requestId}: ${outcome.reason}`);
      }
    } catch (err) {
      success = false;
      console.error(
        `❌ [MOCK VRF] Consumer ${pending.consumer.consumerId} reverted on request ${pending.requestId}:`,
        err instanceof Error ? err.message : err
      );
    }

    sub.balance -= payment;
    this.log("RandomWordsFulfilled", {
      requestId: pending.requestId.toString(),
      outputSeed: pending.requestId.toString(),
      payment: payment.toString(),
      success,
    });
    return { requestId: pending.requestId, payment, success, randomWords: words };
  }

  private requirePending(requestId: bigint, consumerId: string): PendingRequest {
    const pending = this.requests.get(requestId);
    if (!pending) {
      throw new MockVrfError("nonexistent request", `nonexistent request ${requestId}`);
    }
    if (pending.consumer.consumerId !== consumerId) {
      throw new MockVrfError(
        "InvalidConsumer",
        `Request ${requestId} belongs to ${pending.consumer.consumerId}, not ${consumerId}`
      );
    }
    return pending;
  }

  private requireSubscription(subId: bigint) {
    const sub = this.subscriptions.get(subId);
    if (!sub) {
      throw new MockVrfError("InvalidSubscription", `Subscription ${subId} does not exist`);
    }
    return sub;
  }

  private log(event: MockLogEntry["event"], args: MockLogEntry["args"]): void {
    this.logs.push({ event, args });
  }
}
