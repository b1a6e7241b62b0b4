/**
 * Console Engine
 *
 * Parses console input lines and runs them against a Simulation.
 * Provides a simple API for a terminal or UI front end.
 */

import type { Simulation } from '@/engine/core/Simulation';
import {
  COMMAND_MAP,
  type ConsoleCommand,
  type CommandResult,
  type ParsedArgs,
} from '@/config/consoleCommands';
import { debugCommands } from '@/utils/debugLogger';

// Console output entry
export interface ConsoleEntry {
  id: number;
  type: 'input' | 'output' | 'error' | 'success';
  text: string;
  tick: number;
}

type ParseArgsResult = { success: true; args: ParsedArgs } | { success: false; message: string };

export class ConsoleEngine {
  private readonly sim: Simulation;

  // Console state
  private history: ConsoleEntry[] = [];
  private maxHistorySize: number;
  private nextEntryId = 1;

  constructor(sim: Simulation, maxHistorySize: number = 100) {
    this.sim = sim;
    this.maxHistorySize = maxHistorySize;
  }

  // ---------------------------------------------------------------------------
  // Output Management
  // ---------------------------------------------------------------------------

  private addEntry(type: ConsoleEntry['type'], text: string): void {
    this.history.push({ id: this.nextEntryId++, type, text, tick: this.sim.world.tick });

    while (this.history.length > this.maxHistorySize) {
      this.history.shift();
    }
  }

  public getHistory(): ConsoleEntry[] {
    return [...this.history];
  }

  // ---------------------------------------------------------------------------
  // Command Execution
  // ---------------------------------------------------------------------------

  public execute(input: string): CommandResult {
    const trimmed = input.trim();
    if (!trimmed) {
      return { success: false, message: '' };
    }

    this.addEntry('input', `> ${trimmed}`);

    const tokens = tokenize(trimmed);
    const [commandName, ...rawArgs] = tokens;
    if (commandName === undefined) {
      return this.fail('Invalid command syntax');
    }

    const command = COMMAND_MAP.get(commandName.toLowerCase());
    if (!command) {
      return this.fail(`Unknown command: ${commandName}`);
    }

    const argsResult = parseArgs(command, rawArgs);
    if (!argsResult.success) {
      return this.fail(argsResult.message);
    }

    let result: CommandResult;
    try {
      result = command.execute(argsResult.args, { sim: this.sim });
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      debugCommands.error(`[ConsoleEngine] ${command.name} failed:`, err);
      result = { success: false, message: `Error: ${error}` };
    }

    if (result.message) {
      this.addEntry(result.success ? 'success' : 'error', result.message);
    }
    return result;
  }

  private fail(message: string): CommandResult {
    this.addEntry('error', message);
    return { success: false, message };
  }
}

/**
 * Split a line into tokens on spaces, keeping quoted strings together.
 */
export function tokenize(input: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let inQuotes = false;
  let quoteChar = '';

  for (const char of input) {
    if ((char === '"' || char === "'") && !inQuotes) {
      inQuotes = true;
      quoteChar = char;
    } else if (char === quoteChar && inQuotes) {
      inQuotes = false;
      quoteChar = '';
    } else if (char === ' ' && !inQuotes) {
      if (current) {
        tokens.push(current);
        current = '';
      }
    } else {
      current += char;
    }
  }

  if (current) {
    tokens.push(current);
  }
  return tokens;
}

export function parseArgs(command: ConsoleCommand, rawArgs: string[]): ParseArgsResult {
  const args: ParsedArgs = {};
  const cmdArgs = command.args || [];

  for (let i = 0; i < cmdArgs.length; i++) {
    const argDef = cmdArgs[i];
    const rawValue = rawArgs[i];

    if (rawValue === undefined) {
      if (argDef.required) {
        return {
          success: false,
          message: `Missing required argument: ${argDef.name}\nUsage: ${command.usage || command.name}`,
        };
      }
      args[argDef.name] = argDef.default;
      continue;
    }

    switch (argDef.type) {
      case 'number': {
        const num = parseFloat(rawValue);
        if (isNaN(num)) {
          return { success: false, message: `Invalid number for ${argDef.name}: ${rawValue}` };
        }
        args[argDef.name] = num;
        break;
      }
      case 'boolean': {
        const lower = rawValue.toLowerCase();
        if (lower === 'true' || lower === '1' || lower === 'yes' || lower === 'on') {
          args[argDef.name] = true;
        } else if (lower === 'false' || lower === '0' || lower === 'no' || lower === 'off') {
          args[argDef.name] = false;
        } else {
          return { success: false, message: `Invalid boolean for ${argDef.name}: ${rawValue}` };
        }
        break;
      }
      case 'enum': {
        if (argDef.options && !argDef.options.includes(rawValue)) {
          return {
            success: false,
            message: `Invalid value for ${argDef.name}: ${rawValue}. Options: ${argDef.options.join(', ')}`,
          };
        }
        args[argDef.name] = rawValue;
        break;
      }
      default:
        args[argDef.name] = rawValue;
    }
  }

  return { success: true, args };
}
