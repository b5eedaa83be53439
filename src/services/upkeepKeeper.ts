import { every, ScheduledTask } from "../utils/scheduler";
import { UpkeepNotNeededError } from "../utils/raffleErrors";
import { UpkeepCoordinator, decodePerformData } from "./upkeepCoordinator";

export type KeeperTickResult =
  | { performed: true; requestId: bigint }
  | { performed: false; failedChecks: string[] };

/**
 * Polls checkUpkeep and starts a draw when one is due, the job an external
 * automation network would otherwise do.
 */
export class UpkeepKeeper {
  private task: ScheduledTask | null = null;

  constructor(
    private readonly coordinator: UpkeepCoordinator,
    private readonly intervalMs: number,
    private readonly timeoutMs: number = 20_000
  ) {}

  /** The signal aborts an in-flight randomness request. */
  async tick(signal?: AbortSignal): Promise<KeeperTickResult> {
    const { upkeepNeeded, performData } = this.coordinator.checkUpkeep();
    if (!upkeepNeeded) {
      return { performed: false, failedChecks: decodePerformData(performData) };
    }

    try {
      const requestId = await this.coordinator.performUpkeep(performData, signal);
      console.log(`🤖 [KEEPER] Upkeep performed (requestId: ${requestId})`);
      return { performed: true, requestId };
    } catch (err) {
      // Someone else started the draw between check and perform.
      if (err instanceof UpkeepNotNeededError) {
        console.log(`🤖 [KEEPER] ${err.message}`);
        return { performed: false, failedChecks: [] };
      }
      throw err;
    }
  }

  start(): boolean {
    if (this.intervalMs <= 0) {
      console.log("⏸️ [KEEPER] Disabled (UPKEEP_POLL_INTERVAL_MS=0)");
      return false;
    }
    if (this.task) return true;

    this.task = every(
      "upkeepKeeper",
      this.intervalMs,
      async (signal) => {
        const result = await this.tick(signal);
        if (!result.performed && result.failedChecks.length > 0) {
          console.log(`🤖 [KEEPER] Not due: ${result.failedChecks.join(", ")}`);
        }
      },
      { jitterMs: 0, timeoutMs: this.timeoutMs }
    );
    console.log(`🤖 [KEEPER] Polling checkUpkeep every ${this.intervalMs}ms`);
    return true;
  }

  stop(): void {
    this.task?.stop();
    this.task = null;
  }

  isStarted(): boolean {
    return this.task !== null;
  }
}
