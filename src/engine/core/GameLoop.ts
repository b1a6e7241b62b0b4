import { debugPerformance } from '@/utils/debugLogger';

export type UpdateCallback = (deltaTime: number) => void;

export interface GameLoopOptions {
  /** Millisecond clock; defaults to performance.now() */
  now?: () => number;
}

/**
 * Fixed-timestep loop on Node timers.
 *
 * Real elapsed time only decides how many ticks to run; every tick is handed
 * the same fixed step (1 / tickRate seconds), so results never depend on
 * scheduling jitter.
 */
export class GameLoop {
  private readonly tickRate: number;
  private readonly tickMs: number;
  private isRunning = false;
  private lastTime = 0;
  private accumulator = 0;
  private intervalId: ReturnType<typeof setInterval> | null = null;

  private readonly updateCallback: UpdateCallback;
  private readonly now: () => number;

  constructor(tickRate: number, updateCallback: UpdateCallback, options: GameLoopOptions = {}) {
    this.tickRate = tickRate;
    this.tickMs = 1000 / tickRate;
    this.updateCallback = updateCallback;
    this.now = options.now ?? (() => performance.now());
  }

  public start(): void {
    if (this.isRunning) return;

    this.isRunning = true;
    this.lastTime = this.now();
    this.accumulator = 0;
    this.intervalId = setInterval(() => this.tick(), this.tickMs);
  }

  public stop(): void {
    this.isRunning = false;

    if (this.intervalId !== null) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
  }

  private tick(): void {
    if (!this.isRunning) return;

    const currentTime = this.now();
    const deltaTime = currentTime - this.lastTime;
    this.lastTime = currentTime;

    // Cap delta to prevent spiral of death (e.g., if the event loop was blocked)
    this.accumulator += Math.min(deltaTime, 250);

    // Fixed timestep updates with both iteration AND time budget limits
    let iterations = 0;
    const maxIterations = 10;
    const timeBudgetMs = 50;
    const tickStart = this.now();
    const stepSeconds = 1 / this.tickRate;

    while (this.accumulator >= this.tickMs && iterations < maxIterations) {
      if (iterations > 0 && this.now() - tickStart > timeBudgetMs) {
        debugPerformance.warn(`[GameLoop] Yielding after ${iterations} iterations (time budget exceeded)`);
        break;
      }

      this.updateCallback(stepSeconds);
      this.accumulator -= this.tickMs;
      iterations++;
    }

    if (iterations > 1) {
      debugPerformance.warn(`[GameLoop] caught up ${iterations} ticks, accumulator=${this.accumulator.toFixed(1)}ms`);
    }
  }

  public dispose(): void {
    this.stop();
  }
}
