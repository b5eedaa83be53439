import { z } from "zod";
import { AppStateRepository } from "./appStateRepository";
import { RaffleSnapshot, RaffleState } from "../types/raffle";

const decimalString = z.string().regex(/^\d+$/, "must be a decimal string");

const raffleSnapshotSchema = z.object({
  state: z.nativeEnum(RaffleState),
  players: z.array(z.string()),
  pooledBalance: decimalString,
  lastTimestamp: z.number().int().nonnegative(),
  recentWinner: z.string().nullable(),
  pendingRequestId: decimalString.nullable(),
});

export function parseRaffleSnapshot(raw: string): RaffleSnapshot {
  return raffleSnapshotSchema.parse(JSON.parse(raw));
}

/** Where the active cycle is kept between restarts. */
export interface RaffleStateStore {
  load(): Promise<RaffleSnapshot | null>;
  save(snapshot: RaffleSnapshot): Promise<void>;
}

export const RAFFLE_STATE_KEY = "raffle_snapshot";

export class PgRaffleStateStore implements RaffleStateStore {
  constructor(
    private readonly stateRepo: AppStateRepository,
    private readonly key: string = RAFFLE_STATE_KEY
  ) {}

  async load(): Promise<RaffleSnapshot | null> {
    const raw = await this.stateRepo.get(this.key);
    return raw === null ? null : parseRaffleSnapshot(raw);
  }

  async save(snapshot: RaffleSnapshot): Promise<void> {
    await this.stateRepo.set(this.key, JSON.stringify(snapshot));
  }
}

export class InMemoryRaffleStateStore implements RaffleStateStore {
  private raw: string | null = null;
  saves = 0;

  async load(): Promise<RaffleSnapshot | null> {
    return this.raw === null ? null : parseRaffleSnapshot(this.raw);
  }

  async save(snapshot: RaffleSnapshot): Promise<void> {
    this.raw = JSON.stringify(snapshot);
    this.saves++;
  }
}
