import type { EventBus } from './EventBus';
import { debugSimulation } from '@/utils/debugLogger';

export type ClockState = 'running' | 'paused' | 'reversing';
export type TimeDirection = 'forward' | 'reverse';

export interface ClockHandlers {
  /** One forward physics tick followed by a history append */
  forward: () => void;
  /** One step of reverse playback */
  reverse: () => void;
}

/**
 * SimulationClock - Running / Paused / Reversing state machine.
 *
 * Only external control commands change the state; tick() never does.
 */
export class SimulationClock {
  private state: ClockState = 'running';
  private eventBus: EventBus;

  constructor(eventBus: EventBus) {
    this.eventBus = eventBus;
  }

  public getState(): ClockState {
    return this.state;
  }

  public isPaused(): boolean {
    return this.state === 'paused';
  }

  public getDirection(): TimeDirection {
    return this.state === 'reversing' ? 'reverse' : 'forward';
  }

  public setPaused(paused: boolean): void {
    this.transition(paused ? 'paused' : 'running');
  }

  public setDirection(direction: TimeDirection): void {
    this.transition(direction === 'reverse' ? 'reversing' : 'running');
  }

  /** Back to forward simulation (after a jump-back or reset) */
  public resume(): void {
    this.transition('running');
  }

  /**
   * Execute one tick according to the current state.
   * @returns The state the tick ran in
   */
  public tick(handlers: ClockHandlers): ClockState {
    const state = this.state;
    switch (state) {
      case 'running':
        handlers.forward();
        break;
      case 'reversing':
        handlers.reverse();
        break;
      case 'paused':
        break;
    }
    return state;
  }

  private transition(to: ClockState): void {
    const from = this.state;
    if (from === to) return;

    this.state = to;
    debugSimulation.log(`[SimulationClock] ${from} -> ${to}`);
    this.eventBus.emit('clock:stateChanged', { from, to });
  }
}
