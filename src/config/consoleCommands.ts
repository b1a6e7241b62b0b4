/**
 * Console Commands Configuration
 *
 * Declarative command definitions for the operator console. Each command
 * turns its text arguments into a wire payload and hands it to the same
 * Simulation boundary operations any other front end uses.
 */

import type { Simulation } from '@/engine/core/Simulation';
import type { CommandResult as SimulationCommandResult } from '@/engine/core/SimulationCommand';

// =============================================================================
// Types
// =============================================================================

export type CommandCategory = 'orders' | 'time' | 'info';

export type ArgType = 'string' | 'number' | 'boolean' | 'enum';

export interface CommandArg {
  name: string;
  type: ArgType;
  required?: boolean;
  default?: string | number | boolean;
  options?: string[]; // For enum types
  description: string;
}

export type ArgValue = string | number | boolean | undefined;

export interface ParsedArgs {
  [key: string]: ArgValue;
}

export interface SimulationContext {
  sim: Simulation;
}

export interface CommandResult {
  success: boolean;
  message: string;
}

export interface ConsoleCommand {
  name: string;
  aliases?: string[];
  description: string;
  usage?: string;
  category: CommandCategory;
  args?: CommandArg[];
  execute: (args: ParsedArgs, ctx: SimulationContext) => CommandResult;
}

// =============================================================================
// Argument helpers
// =============================================================================

function stringArg(args: ParsedArgs, name: string): string {
  const value = args[name];
  return typeof value === 'string' ? value : String(value ?? '');
}

function numberArg(args: ParsedArgs, name: string): number | undefined {
  const value = args[name];
  return typeof value === 'number' ? value : undefined;
}

/**
 * Expand a drone id list: "all" selects every living friendly drone,
 * anything else is split on commas.
 */
export function resolveDroneIds(value: string, ctx: SimulationContext): string[] {
  if (value.toLowerCase() === 'all') {
    return ctx.sim
      .queryWorld()
      .drones.filter((d) => d.team === 'friendly' && d.mode !== 'destroyed')
      .map((d) => d.id);
  }
  return value
    .split(',')
    .map((id) => id.trim())
    .filter((id) => id.length > 0);
}

/**
 * Parse "x:y;x:y;..." into waypoint objects. Returns null on any malformed pair.
 */
export function parseWaypoints(value: string): Array<{ x: number; y: number }> | null {
  const points: Array<{ x: number; y: number }> = [];
  for (const pair of value.split(';')) {
    const [xs, ys, ...rest] = pair.split(':');
    const x = Number(xs);
    const y = Number(ys);
    if (rest.length > 0 || xs === undefined || ys === undefined || xs === '' || ys === '' || !Number.isFinite(x) || !Number.isFinite(y)) {
      return null;
    }
    points.push({ x, y });
  }
  return points;
}

/**
 * Render a simulation command result as one console line.
 */
export function formatResult(label: string, result: SimulationCommandResult): CommandResult {
  if (!result.success) {
    const detail = result.issues && result.issues.length > 0 ? `: ${result.issues.join('; ')}` : '';
    return { success: false, message: `${result.message}${detail}` };
  }

  let message = label;
  if (result.acceptedIds.length > 0) {
    message += ` ${result.acceptedIds.join(', ')}`;
  }
  if (result.ignoredIds.length > 0) {
    message += ` (ignored: ${result.ignoredIds.join(', ')})`;
  }
  if (result.tick !== undefined) {
    message += ` at tick ${result.tick}`;
  }
  return { success: true, message };
}

function taskCommand(taskName: string, label: string, parameters?: (args: ParsedArgs) => Record<string, unknown>) {
  return (args: ParsedArgs, ctx: SimulationContext): CommandResult => {
    const result = ctx.sim.task({
      task_name: taskName,
      drone_ids: resolveDroneIds(stringArg(args, 'ids'), ctx),
      parameters: parameters ? parameters(args) : {},
    });
    return formatResult(label, result);
  };
}

const IDS_ARG: CommandArg = {
  name: 'ids',
  type: 'string',
  required: true,
  description: 'Comma-separated drone ids, or "all"',
};

// =============================================================================
// Command Definitions
// =============================================================================

export const CONSOLE_COMMANDS: ConsoleCommand[] = [
  // ---------------------------------------------------------------------------
  // ORDERS
  // ---------------------------------------------------------------------------
  {
    name: 'move',
    aliases: ['go'],
    description: 'Send drones to a point as one formation group',
    usage: 'move <ids> <x> <y>',
    category: 'orders',
    args: [
      IDS_ARG,
      { name: 'x', type: 'number', required: true, description: 'Target X coordinate' },
      { name: 'y', type: 'number', required: true, description: 'Target Y coordinate' },
    ],
    execute: (args, ctx) =>
      formatResult(
        'Moving',
        ctx.sim.move({
          drone_ids: resolveDroneIds(stringArg(args, 'ids'), ctx),
          target_x: numberArg(args, 'x'),
          target_y: numberArg(args, 'y'),
        })
      ),
  },
  {
    name: 'patrol',
    description: 'Loop drones through waypoints',
    usage: 'patrol <ids> <x:y;x:y;...>',
    category: 'orders',
    args: [
      IDS_ARG,
      { name: 'points', type: 'string', required: true, description: 'Waypoints as x:y pairs separated by ;' },
    ],
    execute: (args, ctx) => {
      const points = parseWaypoints(stringArg(args, 'points'));
      if (!points) {
        return { success: false, message: `Invalid waypoints: ${stringArg(args, 'points')}` };
      }
      return taskCommand('patrol', 'Patrolling', () => ({ points }))(args, ctx);
    },
  },
  {
    name: 'tail',
    aliases: ['follow'],
    description: 'Keep drones at a set distance from a target drone',
    usage: 'tail <ids> <targetId> [distance]',
    category: 'orders',
    args: [
      IDS_ARG,
      { name: 'target', type: 'string', required: true, description: 'Drone to follow' },
      { name: 'distance', type: 'number', required: false, description: 'Standoff distance (default 100)' },
    ],
    execute: taskCommand('tail', 'Tailing', (args) => {
      const distance = numberArg(args, 'distance');
      return distance === undefined
        ? { target_id: stringArg(args, 'target') }
        : { target_id: stringArg(args, 'target'), distance };
    }),
  },
  {
    name: 'intercept',
    aliases: ['attack'],
    description: 'Fly drones to the predicted position of an enemy',
    usage: 'intercept <ids> <enemyId>',
    category: 'orders',
    args: [IDS_ARG, { name: 'target', type: 'string', required: true, description: 'Enemy drone to intercept' }],
    execute: taskCommand('intercept', 'Intercepting', (args) => ({ target_id: stringArg(args, 'target') })),
  },
  {
    name: 'hold',
    description: 'Stop drones in place and keep them there',
    usage: 'hold <ids>',
    category: 'orders',
    args: [IDS_ARG],
    execute: taskCommand('hold', 'Holding'),
  },
  {
    name: 'stop',
    description: 'Cancel all orders and idle drones',
    usage: 'stop <ids>',
    category: 'orders',
    args: [IDS_ARG],
    execute: taskCommand('stop', 'Stopped'),
  },
  {
    name: 'rtb',
    aliases: ['home'],
    description: 'Return drones to their assigned base',
    usage: 'rtb <ids>',
    category: 'orders',
    args: [IDS_ARG],
    execute: taskCommand('return_to_base', 'Returning'),
  },
  {
    name: 'base',
    aliases: ['setbase'],
    description: 'Assign drones to a home base',
    usage: 'base <ids> <baseId>',
    category: 'orders',
    args: [IDS_ARG, { name: 'base', type: 'string', required: true, description: 'Base id' }],
    execute: (args, ctx) =>
      formatResult(
        'Rebased',
        ctx.sim.setBase({
          drone_ids: resolveDroneIds(stringArg(args, 'ids'), ctx),
          base_id: stringArg(args, 'base'),
        })
      ),
  },

  // ---------------------------------------------------------------------------
  // TIME
  // ---------------------------------------------------------------------------
  {
    name: 'pause',
    description: 'Pause the simulation',
    category: 'time',
    execute: (_args, ctx) => formatResult('Paused', ctx.sim.pause({ paused: true })),
  },
  {
    name: 'resume',
    aliases: ['unpause'],
    description: 'Resume forward simulation',
    category: 'time',
    execute: (_args, ctx) => formatResult('Resumed', ctx.sim.pause({ paused: false })),
  },
  {
    name: 'reverse',
    aliases: ['rewind'],
    description: 'Play recorded history backwards',
    category: 'time',
    execute: (_args, ctx) => formatResult('Reversing', ctx.sim.timeControl({ action: 'reverse' })),
  },
  {
    name: 'forward',
    description: 'Simulate forward again',
    category: 'time',
    execute: (_args, ctx) => formatResult('Forward', ctx.sim.timeControl({ action: 'forward' })),
  },
  {
    name: 'jump',
    aliases: ['jumpback'],
    description: 'Jump back in recorded history',
    category: 'time',
    execute: (_args, ctx) => formatResult('Jumped back', ctx.sim.jumpBack()),
  },
  {
    name: 'reset',
    description: 'Restore the initial scenario',
    category: 'time',
    execute: (_args, ctx) => formatResult('Reset', ctx.sim.reset()),
  },
  {
    name: 'step',
    aliases: ['tick'],
    description: 'Advance the simulation by a number of ticks',
    usage: 'step [count]',
    category: 'time',
    args: [{ name: 'count', type: 'number', required: false, default: 1, description: 'Ticks to run' }],
    execute: (args, ctx) => {
      const count = numberArg(args, 'count') ?? 1;
      if (!Number.isInteger(count) || count < 0) {
        return { success: false, message: `Invalid tick count: ${count}` };
      }
      ctx.sim.run(count);
      return { success: true, message: `Now at tick ${ctx.sim.world.tick}` };
    },
  },

  // ---------------------------------------------------------------------------
  // INFO
  // ---------------------------------------------------------------------------
  {
    name: 'status',
    aliases: ['stats'],
    description: 'Show tick, clock state and drone counts',
    category: 'info',
    execute: (_args, ctx) => {
      const view = ctx.sim.queryWorld();
      const alive = view.drones.filter((d) => d.mode !== 'destroyed');
      const friendly = alive.filter((d) => d.team === 'friendly').length;

      let msg = 'Simulation Status:\n';
      msg += `  Tick: ${view.tick}\n`;
      msg += `  Time: ${view.time.toFixed(2)}s\n`;
      msg += `  Clock: ${view.clockState}\n`;
      msg += `  Drones: ${friendly} friendly, ${alive.length - friendly} enemy\n`;
      msg += `  Groups: ${view.groups.length}\n`;
      msg += `  History: ${view.history.length}/${view.history.capacity}`;
      return { success: true, message: msg };
    },
  },
  {
    name: 'drones',
    aliases: ['list'],
    description: 'List drones (optionally filtered by team)',
    usage: 'drones [team]',
    category: 'info',
    args: [
      { name: 'team', type: 'enum', required: false, options: ['friendly', 'enemy'], description: 'Team filter' },
    ],
    execute: (args, ctx) => {
      const team = args.team;
      const drones = ctx.sim.queryWorld().drones.filter((d) => team === undefined || d.team === team);
      if (drones.length === 0) {
        return { success: true, message: 'No drones found.' };
      }

      let msg = `Drones: ${drones.length} total\n`;
      for (const d of drones) {
        const pos = `(${d.x.toFixed(0)}, ${d.y.toFixed(0)})`;
        msg += `  ${d.id.padEnd(12)} ${d.team.padEnd(9)} ${pos.padEnd(12)} ${d.mode}\n`;
      }
      return { success: true, message: msg.trimEnd() };
    },
  },
  {
    name: 'help',
    aliases: ['?', 'commands'],
    description: 'List all commands or get help for a specific command',
    usage: 'help [command]',
    category: 'info',
    args: [{ name: 'command', type: 'string', required: false, description: 'Command to get help for' }],
    execute: (args) => {
      const cmdName = args.command;

      if (typeof cmdName === 'string') {
        const cmd = COMMAND_MAP.get(cmdName.toLowerCase());
        if (!cmd) {
          return { success: false, message: `Unknown command: ${cmdName}` };
        }

        let helpText = `${cmd.name}`;
        if (cmd.aliases?.length) {
          helpText += ` (aliases: ${cmd.aliases.join(', ')})`;
        }
        helpText += `\n  ${cmd.description}`;
        if (cmd.usage) {
          helpText += `\n  Usage: ${cmd.usage}`;
        }
        return { success: true, message: helpText };
      }

      const categories: Record<CommandCategory, ConsoleCommand[]> = {
        orders: [],
        time: [],
        info: [],
      };
      for (const cmd of CONSOLE_COMMANDS) {
        categories[cmd.category].push(cmd);
      }

      let helpText = 'Available commands:\n';
      for (const [cat, cmds] of Object.entries(categories)) {
        helpText += `\n[${cat.toUpperCase()}]\n`;
        for (const cmd of cmds) {
          helpText += `  ${cmd.name.padEnd(16)} ${cmd.description}\n`;
        }
      }
      helpText += '\nType "help <command>" for detailed info.';
      return { success: true, message: helpText };
    },
  },
];

// Build command lookup map for fast access
export const COMMAND_MAP: Map<string, ConsoleCommand> = new Map();
for (const cmd of CONSOLE_COMMANDS) {
  COMMAND_MAP.set(cmd.name, cmd);
  if (cmd.aliases) {
    for (const alias of cmd.aliases) {
      COMMAND_MAP.set(alias, cmd);
    }
  }
}
