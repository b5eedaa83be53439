import { AxiosAdapter, AxiosError, InternalAxiosRequestConfig } from "axios";
import { RaffleState } from "../types/raffle";
import { createRaffle } from "../services/raffle";
import { HttpRandomnessProvider } from "../services/httpRandomnessProvider";
import { InMemoryPaymentRail } from "../services/paymentRail";
import { ManualClock } from "../utils/clock";
import { KEY_HASH, PLAYER_1, START_TIME, testConfig } from "./fixtures";

interface Captured {
  config: InternalAxiosRequestConfig | null;
}

function respondWith(status: number, data: unknown, captured: Captured): AxiosAdapter {
  return async (config) => {
    captured.config = config;
    const response = { data, status, statusText: String(status), headers: {}, config };
    if (status >= 400) {
      throw new AxiosError(`Request failed with status code ${status}`, "ERR_BAD_RESPONSE", config, null, response);
    }
    return response;
  };
}

function buildRaffle(provider: HttpRandomnessProvider) {
  const clock = new ManualClock(START_TIME);
  const raffle = createRaffle({
    config: testConfig({ subscriptionId: 42n }),
    provider,
    paymentRail: new InMemoryPaymentRail(),
    clock,
  });
  raffle.ledger.enterRaffle(PLAYER_1, 100n);
  clock.advance(31);
  return raffle;
}

describe("HttpRandomnessProvider", () => {
  it("posts the request routing and returns the service's request id", async () => {
    const captured: Captured = { config: null };
    const provider = new HttpRandomnessProvider({
      serviceUrl: "http://oracle.test",
      apiKey: "test-api-key",
      callbackUrl: "http://raffle.test/api/vrf/fulfill",
      adapter: respondWith(200, { requestId: "9007199254740993" }, captured),
    });
    const raffle = buildRaffle(provider);

    const requestId = await raffle.coordinator.performUpkeep("0x");

    expect(requestId).toBe(9007199254740993n);
    expect(raffle.coordinator.getPendingRequestId()).toBe(9007199254740993n);

    const sent = captured.config;
    expect(sent?.baseURL).toBe("http://oracle.test");
    expect(sent?.url).toBe("/requests");
    expect(sent?.method).toBe("post");
    expect(sent?.headers.get("Authorization")).toBe("Bearer test-api-key");
    expect(typeof sent?.data).toBe("string");
    expect(JSON.parse(String(sent?.data))).toEqual({
      consumer: "raffle",
      callbackUrl: "http://raffle.test/api/vrf/fulfill",
      keyHash: KEY_HASH,
      subscriptionId: "42",
      requestConfirmations: 3,
      callbackGasLimit: 500000,
      numWords: 1,
    });
  });

  it("hands the caller's abort signal to the transport", async () => {
    const captured: Captured = { config: null };
    const provider = new HttpRandomnessProvider({
      serviceUrl: "http://oracle.test",
      callbackUrl: "http://raffle.test/api/vrf/fulfill",
      adapter: respondWith(200, { requestId: "3" }, captured),
    });
    const controller = new AbortController();

    await buildRaffle(provider).coordinator.performUpkeep("0x", controller.signal);

    expect(captured.config?.signal).toBe(controller.signal);
  });

  it("accepts a numeric request id", async () => {
    const provider = new HttpRandomnessProvider({
      serviceUrl: "http://oracle.test",
      callbackUrl: "http://raffle.test/api/vrf/fulfill",
      adapter: respondWith(202, { requestId: 7 }, { config: null }),
    });

    await expect(buildRaffle(provider).coordinator.performUpkeep("0x")).resolves.toBe(7n);
  });

  it("reopens the raffle when the service answers with an unexpected body", async () => {
    const provider = new HttpRandomnessProvider({
      serviceUrl: "http://oracle.test",
      callbackUrl: "http://raffle.test/api/vrf/fulfill",
      adapter: respondWith(200, { id: "1" }, { config: null }),
    });
    const raffle = buildRaffle(provider);

    await expect(raffle.coordinator.performUpkeep("0x")).rejects.toThrow(
      "Randomness service returned an unexpected body"
    );
    expect(raffle.ledger.getRaffleState()).toBe(RaffleState.OPEN);
  });

  it("reopens the raffle when the service is failing", async () => {
    const provider = new HttpRandomnessProvider({
      serviceUrl: "http://oracle.test",
      callbackUrl: "http://raffle.test/api/vrf/fulfill",
      adapter: respondWith(503, { error: "maintenance" }, { config: null }),
    });
    const raffle = buildRaffle(provider);

    await expect(raffle.coordinator.performUpkeep("0x")).rejects.toThrow(
      "Request failed with status code 503"
    );
    expect(raffle.ledger.getRaffleState()).toBe(RaffleState.OPEN);
    expect(raffle.coordinator.getPendingRequestId()).toBeNull();
  });
});
