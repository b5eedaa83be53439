import { FulfillmentOutcome, RandomWordsRequest } from "../types/raffle";

/**
 * A party that asked for randomness and wants the words delivered back.
 * The provider calls rawFulfillRandomWords later, on its own schedule.
 */
export interface RandomnessConsumer {
  readonly consumerId: string;
  rawFulfillRandomWords(
    requestId: bigint,
    randomWords: bigint[]
  ): Promise<FulfillmentOutcome>;
}

export interface RandomnessProvider {
  readonly name: string;
  /**
   * Place a request and return its id. Delivery happens out of band.
   * An aborted signal cancels a request that has not been accepted yet.
   */
  requestRandomWords(
    consumer: RandomnessConsumer,
    request: RandomWordsRequest,
    signal?: AbortSignal
  ): Promise<bigint>;
}
