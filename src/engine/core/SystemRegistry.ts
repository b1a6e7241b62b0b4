import type { System } from '../ecs/System';
import type { ISimulationInstance } from './ISimulationInstance';

/**
 * One system and the systems whose output it reads within a tick.
 */
export interface SystemDefinition {
  /** Must equal the created system's `name` */
  name: string;
  /** Systems that run earlier in the same tick */
  dependencies: string[];
  factory: (sim: ISimulationInstance) => System;
}

/**
 * SystemRegistry - Derives the per-tick system order from declared dependencies.
 *
 * The order is a depth-first topological sort that visits names
 * alphabetically, so it depends only on the dependency graph and never on
 * registration order. Unknown dependencies and cycles are startup errors.
 */
export class SystemRegistry {
  private readonly definitions = new Map<string, SystemDefinition>();

  /**
   * @throws Error when a name is registered twice
   */
  public registerAll(definitions: SystemDefinition[]): void {
    for (const definition of definitions) {
      if (this.definitions.has(definition.name)) {
        throw new Error(`SystemRegistry: "${definition.name}" is registered twice`);
      }
      this.definitions.set(definition.name, definition);
    }
  }

  /**
   * @throws Error naming an unknown dependency, or the path of a cycle
   */
  public getExecutionOrder(): string[] {
    const order: string[] = [];
    const placed = new Set<string>();
    const path: string[] = [];

    const visit = (definition: SystemDefinition): void => {
      if (placed.has(definition.name)) return;

      const loopStart = path.indexOf(definition.name);
      if (loopStart >= 0) {
        const cycle = [...path.slice(loopStart), definition.name];
        throw new Error(`SystemRegistry: dependency cycle ${cycle.join(' -> ')}`);
      }

      path.push(definition.name);
      for (const dependency of [...definition.dependencies].sort()) {
        const required = this.definitions.get(dependency);
        if (!required) {
          throw new Error(`SystemRegistry: "${definition.name}" depends on unknown system "${dependency}"`);
        }
        visit(required);
      }
      path.pop();

      placed.add(definition.name);
      order.push(definition.name);
    };

    for (const name of [...this.definitions.keys()].sort()) {
      const definition = this.definitions.get(name);
      if (definition) visit(definition);
    }
    return order;
  }

  /**
   * Instantiate every system in execution order. Priorities are spaced by
   * ten in that order so World.addSystem() keeps it.
   */
  public createSystems(sim: ISimulationInstance): System[] {
    const systems: System[] = [];

    for (const name of this.getExecutionOrder()) {
      const definition = this.definitions.get(name);
      if (!definition) continue;

      const system = definition.factory(sim);
      if (system.name !== name) {
        throw new Error(`SystemRegistry: factory for "${name}" built "${system.name}"`);
      }
      system.priority = systems.length * 10;
      systems.push(system);
    }

    return systems;
  }
}
