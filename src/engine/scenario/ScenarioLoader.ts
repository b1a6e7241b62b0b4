/**
 * ScenarioLoader - Initial world layouts
 *
 * Scenarios are JSON files under public/data/scenarios, validated with zod
 * before they are turned into drones and bases.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { World } from '../ecs/World';
import { createDrone, type Team } from '../components/Drone';
import { circlePosition, clampPattern, type PatternData } from '../components/Pattern';
import { formatIssues } from '../tasks/TaskRegistry';
import type { SimulationConfig } from '@/data/simulation.config';
import { clamp } from '@/utils/math';

const pointSchema = z.object({ x: z.number().finite(), y: z.number().finite() });

export const patternSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('bounce'),
    axis: z.enum(['x', 'y']),
    min: z.number().finite(),
    max: z.number().finite(),
    direction: z.union([z.literal(1), z.literal(-1)]).default(1),
  }),
  z.object({
    kind: z.literal('circle'),
    centerX: z.number().finite(),
    centerY: z.number().finite(),
    radius: z.number().finite().nonnegative(),
    angle: z.number().finite().default(0),
    direction: z.union([z.literal(1), z.literal(-1)]).default(1),
  }),
  z.object({
    kind: z.literal('waypoints'),
    points: z.array(pointSchema).min(1),
    index: z.number().int().nonnegative().default(0),
  }),
]);

const droneSpecSchema = z.object({
  id: z.string().min(1),
  x: z.number().finite().optional(),
  y: z.number().finite().optional(),
  speed: z.number().finite().positive().optional(),
  radius: z.number().finite().positive().optional(),
  pattern: patternSchema.optional(),
  baseId: z.string().optional(),
});

export const scenarioSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  friendlyGrid: z
    .object({
      count: z.number().int().nonnegative(),
      columns: z.number().int().positive(),
      spacing: z.number().finite(),
      originX: z.number().finite(),
      originY: z.number().finite(),
      idPrefix: z.string().default('drone_'),
      baseId: z.string().optional(),
    })
    .optional(),
  friendlies: z.array(droneSpecSchema).default([]),
  enemies: z.array(droneSpecSchema).default([]),
  bases: z
    .array(
      z.object({
        id: z.string().min(1),
        x: z.number().finite(),
        y: z.number().finite(),
        shape: z.enum(['square', 'circle', 'triangle', 'hexagon']),
        name: z.string(),
      })
    )
    .default([]),
});

export type Scenario = z.infer<typeof scenarioSchema>;
export type ScenarioDroneSpec = z.infer<typeof droneSpecSchema>;

export const DEFAULT_SCENARIO_PATH = fileURLToPath(
  new URL('../../../public/data/scenarios/default.json', import.meta.url)
);

export function parseScenario(data: unknown): Scenario {
  const parsed = scenarioSchema.safeParse(data);
  if (!parsed.success) {
    throw new Error(`Invalid scenario:\n${formatIssues(parsed.error).join('\n')}`);
  }
  return parsed.data;
}

export function loadScenarioFile(path: string = DEFAULT_SCENARIO_PATH): Scenario {
  const content = readFileSync(path, 'utf-8');
  return parseScenario(JSON.parse(content));
}

/** An empty scenario: no drones, no bases */
export const EMPTY_SCENARIO: Scenario = {
  name: 'empty',
  friendlies: [],
  enemies: [],
  bases: [],
};

/** Circle drones always start on their orbit; any given x/y is ignored */
function startPosition(spec: ScenarioDroneSpec, pattern: PatternData | undefined): { x: number; y: number } {
  if (pattern?.kind === 'circle') {
    return circlePosition(pattern);
  }
  if (spec.x !== undefined && spec.y !== undefined) {
    return { x: spec.x, y: spec.y };
  }
  if (pattern?.kind === 'waypoints') {
    return { x: pattern.points[0].x, y: pattern.points[0].y };
  }
  return { x: spec.x ?? 0, y: spec.y ?? 0 };
}

/**
 * Populate an empty world from a scenario.
 * @throws Error on duplicate ids
 */
export function populateWorld(world: World, scenario: Scenario, config: SimulationConfig): void {
  for (const base of scenario.bases) {
    world.addBase({ ...base });
  }

  const grid = scenario.friendlyGrid;
  if (grid) {
    for (let i = 0; i < grid.count; i++) {
      const row = Math.floor(i / grid.columns);
      const col = i % grid.columns;
      world.addDrone(
        createDrone({
          id: `${grid.idPrefix}${i + 1}`,
          team: 'friendly',
          x: grid.originX + col * grid.spacing,
          y: grid.originY + row * grid.spacing,
          speed: config.friendlySpeed,
          radius: config.droneRadius,
          baseId: grid.baseId ?? null,
        })
      );
    }
  }

  for (const spec of scenario.friendlies) {
    addScenarioDrone(world, spec, 'friendly', config.friendlySpeed, config.droneRadius);
  }
  for (const spec of scenario.enemies) {
    addScenarioDrone(world, spec, 'enemy', config.enemySpeed, config.droneRadius);
  }
}

/** Patterns are fitted inside the world before the drone is placed on them */
function addScenarioDrone(world: World, spec: ScenarioDroneSpec, team: Team, speed: number, radius: number): void {
  const pattern = spec.pattern ? clampPattern(spec.pattern, world.width, world.height) : undefined;
  const position = startPosition(spec, pattern);
  world.addDrone(
    createDrone({
      id: spec.id,
      team,
      x: clamp(position.x, 0, world.width),
      y: clamp(position.y, 0, world.height),
      speed: spec.speed ?? speed,
      radius: spec.radius ?? radius,
      pattern: pattern ?? null,
      baseId: spec.baseId ?? null,
    })
  );
}
