// API Response Types
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  code?: string;
  details?: Record<string, unknown>;
}

/** JSON-safe view of the read-only query surface */
export interface RaffleStatusView {
  entranceFee: string;
  raffleState: string;
  numberOfPlayers: number;
  pooledBalance: string;
  recentWinner: string | null;
  interval: number;
  latestTimestamp: number;
  requestConfirmations: number;
  numWords: number;
  pendingRequestId: string | null;
}

export * from "./raffle";
