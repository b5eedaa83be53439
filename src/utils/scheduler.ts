export interface SchedulerOptions {
  jitterMs?: number;
  timeoutMs?: number;
  maxRetries?: number;
  /** Run once right away instead of waiting for the first interval. */
  runImmediately?: boolean;
}

export interface ScheduledTask {
  stop: () => void;
  isRunning: () => boolean;
  lastRun: () => Date | null;
  nextRun: () => Date | null;
}

/**
 * Safe scheduler wrapper that prevents overlapping runs and provides timeouts.
 * The task receives an AbortSignal that fires when timeoutMs elapses.
 */
export function every(
  label: string,
  intervalMs: number,
  task: (signal: AbortSignal) => Promise<void>,
  options: SchedulerOptions = {}
): ScheduledTask {
  const {
    jitterMs = 5000,
    timeoutMs = 20000,
    maxRetries = 2,
    runImmediately = false,
  } = options;

  let running = 0;
  let stopped = false;
  let lastRun: Date | null = null;
  let nextRun: Date | null = null;
  let intervalId: NodeJS.Timeout | null = null;
  const pendingTimers = new Set<NodeJS.Timeout>();
  let retryCount = 0;

  const addJitter = () => (jitterMs > 0 ? Math.random() * jitterMs : 0);

  const later = (fn: () => void, delayMs: number) => {
    const id = setTimeout(() => {
      pendingTimers.delete(id);
      fn();
    }, delayMs);
    pendingTimers.add(id);
  };

  const executeTask = async () => {
    if (stopped) return;
    if (running > 0) {
      console.log(`[SCHED:${label}] SKIP - previous run still active`);
      return;
    }

    running++;
    const startTime = Date.now();
    const abortController = new AbortController();
    const timeoutId = setTimeout(() => abortController.abort(), timeoutMs);

    try {
      console.log(`[SCHED:${label}] START`);
      await task(abortController.signal);

      lastRun = new Date();
      retryCount = 0;
      console.log(`[SCHED:${label}] DONE - ${Date.now() - startTime}ms`);
    } catch (error) {
      const duration = Date.now() - startTime;

      if (abortController.signal.aborted) {
        console.error(`[SCHED:${label}] TIMEOUT after ${duration}ms`);
      } else {
        console.error(
          `[SCHED:${label}] ERROR after ${duration}ms:`,
          error instanceof Error ? error.message : error
        );

        if (retryCount < maxRetries) {
          retryCount++;
          const retryDelay = Math.min(1000 * Math.pow(2, retryCount), 30000);
          console.log(
            `[SCHED:${label}] RETRY ${retryCount}/${maxRetries} in ${retryDelay}ms`
          );
          later(() => void executeTask(), retryDelay);
        } else {
          console.error(`[SCHED:${label}] MAX_RETRIES exceeded, skipping this cycle`);
          retryCount = 0;
        }
      }
    } finally {
      clearTimeout(timeoutId);
      running--;
      nextRun = new Date(Date.now() + intervalMs);
    }
  };

  const initialDelay = runImmediately ? 0 : intervalMs + addJitter();
  nextRun = new Date(Date.now() + initialDelay);

  later(() => {
    void executeTask();
    if (stopped) return;
    intervalId = setInterval(() => {
      void executeTask();
    }, intervalMs);
  }, initialDelay);

  const stop = () => {
    stopped = true;
    if (intervalId) {
      clearInterval(intervalId);
      intervalId = null;
    }
    for (const id of pendingTimers) clearTimeout(id);
    pendingTimers.clear();
    nextRun = null;
  };

  return {
    stop,
    isRunning: () => running > 0,
    lastRun: () => lastRun,
    nextRun: () => nextRun,
  };
}
