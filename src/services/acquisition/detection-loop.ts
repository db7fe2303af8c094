import pino from 'pino';
import { getErrorMessage, isOperationalError } from '../../utils/errors.js';
import { runDetectionCycle, type CycleResult, type DetectionContext, type LoopState } from './detector.js';

const log = pino({ name: 'detection-loop' });

export interface LoopStatus {
  state: LoopState;
  running: boolean;
  cyclesCompleted: number;
  cyclesFailed: number;
  unitsPurchased: number;
  lastCycleAt: Date | null;
  lastResult: CycleResult | null;
  lastError: string | null;
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
function pause(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) return resolve();

    const done = (): void => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}

/**
 * Polls the catalog forever: one detection cycle, then a pause of
 * `intervalMs`, until the signal aborts.
 *
 * Operational failures inside a cycle are logged and the next tick retries.
 * Any other error ends the loop by rejecting `run()`.
 */
export class DetectionLoop {
  private readonly status: LoopStatus = {
    state: 'idle',
    running: false,
    cyclesCompleted: 0,
    cyclesFailed: 0,
    unitsPurchased: 0,
    lastCycleAt: null,
    lastResult: null,
    lastError: null,
  };

  constructor(
    private readonly ctx: DetectionContext,
    private readonly intervalMs: number,
  ) {}

  getStatus(): LoopStatus {
    return { ...this.status };
  }

  async run(signal: AbortSignal): Promise<void> {
    if (this.status.running) {
      throw new Error('Detection loop is already running');
    }

    this.status.running = true;
    log.info({ intervalMs: this.intervalMs }, 'Starting detection loop');

    try {
      while (!signal.aborted) {
        await this.tick(signal);
        await pause(this.intervalMs, signal);
      }
    } finally {
      this.status.running = false;
      this.status.state = 'idle';
    }

    log.info({ cyclesCompleted: this.status.cyclesCompleted }, 'Detection loop stopped');
  }

  private async tick(signal: AbortSignal): Promise<void> {
    const startTime = Date.now();

    try {
      const result = await runDetectionCycle(this.ctx, {
        signal,
        onStateChange: (state) => {
          this.status.state = state;
        },
      });

      this.status.lastResult = result;
      this.status.unitsPurchased += result.unitsPurchased;
      if (result.status === 'failed') {
        this.status.cyclesFailed++;
        this.status.lastError = `cycle failed at ${result.failedStage ?? 'unknown stage'}`;
      } else {
        this.status.cyclesCompleted++;
      }

      const level = result.newItems > 0 ? 'info' : 'debug';
      log[level]({ ...result, durationMs: Date.now() - startTime }, 'Detection cycle complete');
    } catch (err) {
      if (!isOperationalError(err)) throw err;

      this.status.cyclesFailed++;
      this.status.lastError = getErrorMessage(err);
      log.error({ err, durationMs: Date.now() - startTime }, 'Detection cycle failed');
    } finally {
      this.status.lastCycleAt = new Date();
    }
  }
}
