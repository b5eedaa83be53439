import { Pool } from "pg";
import { RaffleWinner, RecordWinnerInput } from "../types/raffle";

export interface WinnerRepository {
  recordWinner(input: RecordWinnerInput): Promise<RaffleWinner>;
  getRecentWinners(limit?: number): Promise<RaffleWinner[]>;
}

interface WinnerRow {
  id: number;
  request_id: string;
  winner_address: string;
  prize_amount: string;
  random_word: string;
  num_players: number;
  drawn_at: Date;
}

export class PgWinnerRepository implements WinnerRepository {
  constructor(private readonly db: Pick<Pool, "query">) {}

  // Replayed WinnerPicked events for the same request keep the first row
  async recordWinner(input: RecordWinnerInput): Promise<RaffleWinner> {
    const result = await this.db.query<WinnerRow>(
      `
      INSERT INTO raffle_winners (request_id, winner_address, prize_amount, random_word, num_players, drawn_at)
      VALUES ($1, $2, $3, $4, $5, $6)
      ON CONFLICT (request_id) DO UPDATE SET request_id = EXCLUDED.request_id
      RETURNING id, request_id::text, winner_address, prize_amount::text, random_word::text, num_players, drawn_at
      `,
      [
        input.requestId.toString(),
        input.winner,
        input.prize.toString(),
        input.randomWord.toString(),
        input.numPlayers,
        input.drawnAt,
      ]
    );
    return result.rows[0];
  }

  async getRecentWinners(limit: number = 10): Promise<RaffleWinner[]> {
    const result = await this.db.query<WinnerRow>(
      `SELECT id, request_id::text, winner_address, prize_amount::text, random_word::text, num_players, drawn_at
       FROM raffle_winners ORDER BY drawn_at DESC, id DESC LIMIT $1`,
      [limit]
    );
    return result.rows;
  }
}

export class InMemoryWinnerRepository implements WinnerRepository {
  private readonly rows: RaffleWinner[] = [];

  async recordWinner(input: RecordWinnerInput): Promise<RaffleWinner> {
    const requestId = input.requestId.toString();
    const existing = this.rows.find((r) => r.request_id === requestId);
    if (existing) return existing;

    const row: RaffleWinner = {
      id: this.rows.length + 1,
      request_id: requestId,
      winner_address: input.winner,
      prize_amount: input.prize.toString(),
      random_word: input.randomWord.toString(),
      num_players: input.numPlayers,
      drawn_at: input.drawnAt,
    };
    this.rows.push(row);
    return row;
  }

  async getRecentWinners(limit: number = 10): Promise<RaffleWinner[]> {
    return [...this.rows].reverse().slice(0, limit);
  }
}
