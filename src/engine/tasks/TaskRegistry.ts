/**
 * TaskRegistry - Closed set of drone tasks and the boundary that validates
 * free-form task names and parameters into it.
 *
 * Everything past parseTask() works on the Task union with exhaustive
 * switches; task names are only looked up here.
 */

import { z } from 'zod';
import type { Point } from '@/utils/math';
import type { WaypointPattern } from '../components/Pattern';

export type Task =
  | { kind: 'move'; target: Point }
  | { kind: 'patrol'; pattern: WaypointPattern }
  | { kind: 'tail'; targetId: string; distance: number | null }
  | { kind: 'hold' }
  | { kind: 'return_to_base' }
  | { kind: 'intercept'; targetId: string }
  | { kind: 'stop' };

export type TaskName = Task['kind'];

const pointSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
});

const emptyParamsSchema = z.object({}).passthrough();

interface TaskDefinition<S extends z.ZodTypeAny> {
  description: string;
  parameters: S;
  build(params: z.infer<S>): Task;
}

function defineTask<S extends z.ZodTypeAny>(definition: TaskDefinition<S>): TaskDefinition<S> {
  return definition;
}

export const TASK_DEFINITIONS = {
  move: defineTask({
    description: 'Fly to a point as a group and disperse into a grid on arrival',
    parameters: z.object({
      target_x: z.number().finite(),
      target_y: z.number().finite(),
    }),
    build: (params) => ({ kind: 'move', target: { x: params.target_x, y: params.target_y } }),
  }),

  patrol: defineTask({
    description: 'Loop through a list of waypoints',
    parameters: z.object({
      points: z.array(pointSchema).min(1),
    }),
    build: (params) => ({
      kind: 'patrol',
      pattern: { kind: 'waypoints', points: params.points.map((p) => ({ x: p.x, y: p.y })), index: 0 },
    }),
  }),

  tail: defineTask({
    description: 'Hold a standoff distance from a target drone',
    parameters: z.object({
      target_id: z.string().min(1),
      distance: z.number().finite().nonnegative().optional(),
    }),
    build: (params) => ({ kind: 'tail', targetId: params.target_id, distance: params.distance ?? null }),
  }),

  hold: defineTask({
    description: 'Stop and hold the current position',
    parameters: emptyParamsSchema,
    build: () => ({ kind: 'hold' }),
  }),

  return_to_base: defineTask({
    description: 'Fly back to the assigned home base',
    parameters: emptyParamsSchema,
    build: () => ({ kind: 'return_to_base' }),
  }),

  intercept: defineTask({
    description: 'Fly to the predicted rendezvous point with an enemy drone',
    parameters: z.object({
      target_id: z.string().min(1),
    }),
    build: (params) => ({ kind: 'intercept', targetId: params.target_id }),
  }),

  stop: defineTask({
    description: 'Drop the current task and go idle',
    parameters: emptyParamsSchema,
    build: () => ({ kind: 'stop' }),
  }),
} satisfies Record<TaskName, TaskDefinition<z.ZodTypeAny>>;

export const TASK_NAMES: TaskName[] = ['move', 'patrol', 'tail', 'hold', 'return_to_base', 'intercept', 'stop'];

export function isTaskName(name: string): name is TaskName {
  return Object.prototype.hasOwnProperty.call(TASK_DEFINITIONS, name);
}

export type ParseTaskResult =
  | { success: true; task: Task }
  | { success: false; error: 'unknown_task'; message: string }
  | { success: false; error: 'schema'; message: string; issues: string[] };

/**
 * Format zod issues as "path: message" strings
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate a task name and its parameters into a Task.
 */
export function parseTask(name: string, parameters: unknown): ParseTaskResult {
  if (!isTaskName(name)) {
    return {
      success: false,
      error: 'unknown_task',
      message: `Unknown task "${name}". Known tasks: ${TASK_NAMES.join(', ')}`,
    };
  }

  const definition: TaskDefinition<z.ZodTypeAny> = TASK_DEFINITIONS[name];
  const parsed = definition.parameters.safeParse(parameters ?? {});
  if (!parsed.success) {
    return {
      success: false,
      error: 'schema',
      message: `Invalid parameters for task "${name}"`,
      issues: formatIssues(parsed.error),
    };
  }

  return { success: true, task: definition.build(parsed.data) };
}
