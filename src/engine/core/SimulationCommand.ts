/**
 * SimulationCommand - Command types, boundary payload schemas and results
 *
 * Every way of driving the simulation from outside (UI, console, a
 * natural-language front end) ends up as one of these commands. Payloads
 * arrive in the wire format below and are validated before they can touch
 * the world.
 */

import { z } from 'zod';
import type { Point } from '@/utils/math';
import { formatIssues, parseTask, type Task } from '../tasks/TaskRegistry';

/**
 * All supported command types
 */
export type SimulationCommandType =
  | 'MOVE'
  | 'TASK'
  | 'SET_BASE'
  | 'PAUSE'
  | 'TIME'
  | 'JUMP_BACK'
  | 'RESET';

export type SimulationCommand =
  | { type: 'MOVE'; droneIds: string[]; target: Point }
  | { type: 'TASK'; droneIds: string[]; task: Task }
  | { type: 'SET_BASE'; droneIds: string[]; baseId: string }
  | { type: 'PAUSE'; paused: boolean }
  | { type: 'TIME'; action: 'reverse' | 'forward' }
  | { type: 'JUMP_BACK' }
  | { type: 'RESET' };

/** Commands that mutate entities; they wait for the next forward tick */
export type WorldCommand = Extract<SimulationCommand, { type: 'MOVE' | 'TASK' | 'SET_BASE' }>;

export function isWorldCommand(command: SimulationCommand): command is WorldCommand {
  return command.type === 'MOVE' || command.type === 'TASK' || command.type === 'SET_BASE';
}

// ============================================================================
// WIRE PAYLOADS
// ============================================================================

const droneIdsSchema = z.array(z.string());

export const movePayloadSchema = z.object({
  drone_ids: droneIdsSchema,
  target_x: z.number().finite(),
  target_y: z.number().finite(),
});

export const taskPayloadSchema = z.object({
  task_name: z.string(),
  drone_ids: droneIdsSchema,
  parameters: z.record(z.unknown()).optional(),
});

export const setBasePayloadSchema = z.object({
  drone_ids: droneIdsSchema,
  base_id: z.string(),
});

export const pausePayloadSchema = z.object({
  paused: z.boolean(),
});

export const timePayloadSchema = z.object({
  action: z.enum(['reverse', 'forward']),
});

// ============================================================================
// RESULTS
// ============================================================================

export type CommandErrorKind = 'schema' | 'unknown_task';

export interface CommandSuccess {
  success: true;
  command: SimulationCommandType;
  /** Ids the command applies to */
  acceptedIds: string[];
  /** Ids that do not resolve to a controllable drone (or whose referenced base/target is missing) */
  ignoredIds: string[];
  /** True when the command waits for the next forward tick */
  queued: boolean;
  /** Command group allocated by a move */
  groupId?: number;
  /** World tick after a control command took effect */
  tick?: number;
}

export interface CommandFailure {
  success: false;
  error: CommandErrorKind;
  message: string;
  issues?: string[];
}

export type CommandResult = CommandSuccess | CommandFailure;

export type ParseCommandResult =
  | { success: true; command: SimulationCommand }
  | CommandFailure;

function schemaFailure(operation: string, error: z.ZodError): CommandFailure {
  return {
    success: false,
    error: 'schema',
    message: `Invalid ${operation} payload`,
    issues: formatIssues(error),
  };
}

export function parseMovePayload(payload: unknown): ParseCommandResult {
  const parsed = movePayloadSchema.safeParse(payload);
  if (!parsed.success) return schemaFailure('move', parsed.error);
  return {
    success: true,
    command: {
      type: 'MOVE',
      droneIds: parsed.data.drone_ids,
      target: { x: parsed.data.target_x, y: parsed.data.target_y },
    },
  };
}

export function parseTaskPayload(payload: unknown): ParseCommandResult {
  const parsed = taskPayloadSchema.safeParse(payload);
  if (!parsed.success) return schemaFailure('task', parsed.error);

  const task = parseTask(parsed.data.task_name, parsed.data.parameters);
  if (!task.success) return task;

  return {
    success: true,
    command: { type: 'TASK', droneIds: parsed.data.drone_ids, task: task.task },
  };
}

export function parseSetBasePayload(payload: unknown): ParseCommandResult {
  const parsed = setBasePayloadSchema.safeParse(payload);
  if (!parsed.success) return schemaFailure('set base', parsed.error);
  return {
    success: true,
    command: { type: 'SET_BASE', droneIds: parsed.data.drone_ids, baseId: parsed.data.base_id },
  };
}

export function parsePausePayload(payload: unknown): ParseCommandResult {
  const parsed = pausePayloadSchema.safeParse(payload);
  if (!parsed.success) return schemaFailure('pause', parsed.error);
  return { success: true, command: { type: 'PAUSE', paused: parsed.data.paused } };
}

export function parseTimePayload(payload: unknown): ParseCommandResult {
  const parsed = timePayloadSchema.safeParse(payload);
  if (!parsed.success) return schemaFailure('time control', parsed.error);
  return { success: true, command: { type: 'TIME', action: parsed.data.action } };
}
