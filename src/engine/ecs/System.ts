import type { ISimulationInstance } from '../core/ISimulationInstance';
import type { World } from './World';

export abstract class System {
  public enabled = true;
  public priority = 0;

  /**
   * Human-readable system name for debugging and dependency ordering.
   */
  public abstract readonly name: string;

  protected world!: World;
  protected sim: ISimulationInstance;

  constructor(sim: ISimulationInstance) {
    this.sim = sim;
  }

  public init(world: World): void {
    this.world = world;
  }

  public abstract update(deltaTime: number): void;
}
