import axios, { AxiosAdapter, AxiosInstance } from "axios";
import { z } from "zod";
import { RandomWordsRequest } from "../types/raffle";
import { RandomnessConsumer, RandomnessProvider } from "./randomnessProvider";

const requestAcceptedSchema = z.object({
  requestId: z.union([
    z.string().regex(/^\d+$/, "requestId must be a decimal string"),
    z.number().int().nonnegative(),
  ]),
});

export interface HttpRandomnessProviderOptions {
  serviceUrl: string;
  apiKey?: string;
  /** Public URL the oracle posts fulfillments to. */
  callbackUrl: string;
  timeoutMs?: number;
  /** Transport override; tests use it to answer in process. */
  adapter?: AxiosAdapter;
}

/**
 * Randomness provider reached over HTTP. Requests are POSTed to the oracle
 * service; the words come back later on the signed /api/vrf/fulfill webhook,
 * which hands them to the consumer.
 */
export class HttpRandomnessProvider implements RandomnessProvider {
  readonly name = "HttpRandomnessProvider";
  private readonly client: AxiosInstance;

  constructor(private readonly options: HttpRandomnessProviderOptions) {
    this.client = axios.create({
      baseURL: options.serviceUrl,
      timeout: options.timeoutMs ?? 15_000,
      headers: {
        "Content-Type": "application/json",
        ...(options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : {}),
        "User-Agent": "raffle-backend/1.0",
      },
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  async requestRandomWords(
    consumer: RandomnessConsumer,
    request: RandomWordsRequest,
    signal?: AbortSignal
  ): Promise<bigint> {
    console.log(
      `📡 [VRF HTTP] Requesting ${request.numWords} word(s) for ${consumer.consumerId} from ${this.options.serviceUrl}`
    );

    const response = await this.client.post(
      "/requests",
      {
        consumer: consumer.consumerId,
        callbackUrl: this.options.callbackUrl,
        keyHash: request.keyHash,
        subscriptionId: request.subscriptionId.toString(),
        requestConfirmations: request.requestConfirmations,
        callbackGasLimit: request.callbackGasLimit,
        numWords: request.numWords,
      },
      { signal }
    );

    const parsed = requestAcceptedSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new Error(
        `Randomness service returned an unexpected body: ${parsed.error.issues
          .map((i) => i.message)
          .join("; ")}`
      );
    }

    const requestId = BigInt(parsed.data.requestId);
    console.log(`✅ [VRF HTTP] Request accepted (requestId: ${requestId})`);
    return requestId;
  }
}
