/**
 * Simulation - Owns the world and everything that mutates it
 *
 * One instance is the single writer of its World: commands, ticks, rewinds
 * and resets all run through it, one at a time, on the caller's thread.
 * World commands (move, task, set base) are validated when issued and
 * applied at the start of the next forward tick; control commands (pause,
 * time direction, jump-back, reset) take effect immediately, between ticks.
 */

import { World } from '../ecs/World';
import { EventBus } from './EventBus';
import { SystemRegistry, type SystemDefinition } from './SystemRegistry';
import { SimulationClock, type ClockState, type TimeDirection } from './SimulationClock';
import { GameLoop } from './GameLoop';
import type { ISimulationInstance } from './ISimulationInstance';
import {
  isWorldCommand,
  parseMovePayload,
  parsePausePayload,
  parseSetBasePayload,
  parseTaskPayload,
  parseTimePayload,
  type CommandResult,
  type CommandSuccess,
  type ParseCommandResult,
  type SimulationCommand,
  type WorldCommand,
} from './SimulationCommand';
import { HistoryBuffer } from '../history/HistoryBuffer';
import { SYSTEM_DEFINITIONS } from '../systems/systemDependencies';
import { loadScenarioFile, populateWorld, type Scenario } from '../scenario/ScenarioLoader';
import { cloneDrone, setIdle, type Drone } from '../components/Drone';
import { cloneBase, type Base } from '../components/Base';
import { cloneCommandGroup, type CommandGroup } from '../components/CommandGroup';
import { clampPattern } from '../components/Pattern';
import type { Task } from '../tasks/TaskRegistry';
import { resolveSimulationConfig, type SimulationConfig } from '@/data/simulation.config';
import { clamp, type Point } from '@/utils/math';
import { debugCommands, debugHistory, debugSimulation } from '@/utils/debugLogger';

export interface SimulationOptions {
  config?: Partial<SimulationConfig>;
  /** Initial layout; defaults to public/data/scenarios/default.json */
  scenario?: Scenario;
  /** Systems to run each forward tick; defaults to SYSTEM_DEFINITIONS */
  systems?: SystemDefinition[];
}

export interface HistoryStatus {
  length: number;
  capacity: number;
  cursor: number;
  oldestTick: number | null;
  newestTick: number | null;
}

/**
 * Read-only copy of the live world at one tick. Nothing in it aliases
 * simulation state.
 */
export interface WorldView {
  tick: number;
  /** Simulation seconds */
  time: number;
  paused: boolean;
  direction: TimeDirection;
  clockState: ClockState;
  drones: Drone[];
  bases: Base[];
  groups: CommandGroup[];
  history: HistoryStatus;
}

interface ResolvedTargets {
  acceptedIds: string[];
  ignoredIds: string[];
}

export class Simulation implements ISimulationInstance {
  public readonly world: World;
  public readonly eventBus: EventBus;
  public readonly config: SimulationConfig;
  public readonly clock: SimulationClock;
  public readonly history: HistoryBuffer;

  private readonly scenario: Scenario;
  private commandQueue: WorldCommand[] = [];
  private reverseExhausted = false;
  private loop: GameLoop | null = null;

  constructor(options: SimulationOptions = {}) {
    this.config = resolveSimulationConfig(options.config);
    this.eventBus = new EventBus();
    this.world = new World({
      dt: this.config.dt,
      width: this.config.worldWidth,
      height: this.config.worldHeight,
    });
    this.clock = new SimulationClock(this.eventBus);
    this.history = new HistoryBuffer(this.config.historyCapacity);
    this.scenario = options.scenario ?? loadScenarioFile();

    this.initializeSystems(options.systems ?? SYSTEM_DEFINITIONS);
    populateWorld(this.world, this.scenario, this.config);
  }

  private initializeSystems(definitions: SystemDefinition[]): void {
    const registry = new SystemRegistry();
    registry.registerAll(definitions);

    for (const system of registry.createSystems(this)) {
      this.world.addSystem(system);
    }
    debugSimulation.log(`[Simulation] Systems: ${registry.getExecutionOrder().join(' -> ')}`);
  }

  // ============================================================================
  // TICKING
  // ============================================================================

  /**
   * Advance one tick in whatever mode the clock is in.
   * @returns The clock state the tick ran in
   */
  public step(): ClockState {
    return this.clock.tick({
      forward: () => this.forwardTick(),
      reverse: () => this.reverseTick(),
    });
  }

  /** Run `ticks` consecutive steps */
  public run(ticks: number): void {
    for (let i = 0; i < ticks; i++) {
      this.step();
    }
  }

  private forwardTick(): void {
    this.drainCommands();

    this.world.tick++;
    this.world.update(this.config.dt);
    this.history.push(this.world.snapshot());
    this.reverseExhausted = false;

    this.eventBus.emit('simulation:tick', {
      tick: this.world.tick,
      time: this.world.getTime(),
      droneCount: this.world.drones.size,
    });
  }

  private reverseTick(): void {
    const snapshot = this.history.stepBack();
    if (!snapshot) {
      if (!this.reverseExhausted) {
        this.reverseExhausted = true;
        debugHistory.log(`[Simulation] Reverse playback reached the oldest snapshot (tick ${this.world.tick})`);
        this.eventBus.emit('history:exhausted', { tick: this.world.tick });
      }
      return;
    }

    this.world.restore(snapshot);
    this.eventBus.emit('history:restored', { tick: snapshot.tick, reason: 'reverse' });
  }

  /** Start ticking in real time at config.tickRate */
  public start(): void {
    if (!this.loop) {
      this.loop = new GameLoop(this.config.tickRate, () => {
        this.step();
      });
    }
    this.loop.start();
  }

  public stop(): void {
    this.loop?.stop();
  }

  public dispose(): void {
    this.loop?.dispose();
    this.loop = null;
    this.eventBus.clear();
  }

  // ============================================================================
  // QUERY
  // ============================================================================

  public queryWorld(): WorldView {
    return {
      tick: this.world.tick,
      time: this.world.getTime(),
      paused: this.clock.isPaused(),
      direction: this.clock.getDirection(),
      clockState: this.clock.getState(),
      drones: Array.from(this.world.drones.values(), cloneDrone),
      bases: Array.from(this.world.bases.values(), cloneBase),
      groups: Array.from(this.world.groups.values(), cloneCommandGroup),
      history: {
        length: this.history.length,
        capacity: this.history.capacity,
        cursor: this.history.getCursor(),
        oldestTick: this.history.oldestTick() ?? null,
        newestTick: this.history.newestTick() ?? null,
      },
    };
  }

  public getPendingCommandCount(): number {
    return this.commandQueue.length;
  }

  // ============================================================================
  // BOUNDARY OPERATIONS (wire payloads)
  // ============================================================================

  /** `{ drone_ids, target_x, target_y }` */
  public move(payload: unknown): CommandResult {
    return this.executeParsed(parseMovePayload(payload));
  }

  /** `{ task_name, drone_ids, parameters }` */
  public task(payload: unknown): CommandResult {
    return this.executeParsed(parseTaskPayload(payload));
  }

  /** `{ drone_ids, base_id }` */
  public setBase(payload: unknown): CommandResult {
    return this.executeParsed(parseSetBasePayload(payload));
  }

  /** `{ paused }` */
  public pause(payload: unknown): CommandResult {
    return this.executeParsed(parsePausePayload(payload));
  }

  /** `{ action: 'reverse' | 'forward' }` */
  public timeControl(payload: unknown): CommandResult {
    return this.executeParsed(parseTimePayload(payload));
  }

  public jumpBack(): CommandResult {
    return this.execute({ type: 'JUMP_BACK' });
  }

  public reset(): CommandResult {
    return this.execute({ type: 'RESET' });
  }

  private executeParsed(parsed: ParseCommandResult): CommandResult {
    if (!parsed.success) {
      debugCommands.warn(`[Simulation] Rejected command: ${parsed.message}`, parsed.issues ?? []);
      return parsed;
    }
    return this.execute(parsed.command);
  }

  /**
   * Execute an already-validated command.
   */
  public execute(command: SimulationCommand): CommandResult {
    this.eventBus.emit('command:received', command);

    if (isWorldCommand(command)) {
      const preview = this.resolveTargets(command);
      this.commandQueue.push(command);
      debugCommands.log(`[Simulation] Queued ${command.type} for ${preview.acceptedIds.length} drone(s)`);
      return { success: true, command: command.type, ...preview, queued: true };
    }

    switch (command.type) {
      case 'PAUSE':
        this.clock.setPaused(command.paused);
        break;
      case 'TIME':
        this.clock.setDirection(command.action);
        break;
      case 'JUMP_BACK':
        this.restoreJumpBack();
        break;
      case 'RESET':
        this.resetWorld();
        break;
    }

    return {
      success: true,
      command: command.type,
      acceptedIds: [],
      ignoredIds: [],
      queued: false,
      tick: this.world.tick,
    };
  }

  // ============================================================================
  // CONTROL
  // ============================================================================

  private restoreJumpBack(): void {
    const snapshot = this.history.jumpBack(this.config.jumpBackTicks);
    if (snapshot) {
      this.world.restore(snapshot);
      this.reverseExhausted = false;
      debugHistory.log(`[Simulation] Jumped back to tick ${snapshot.tick}`);
      this.eventBus.emit('history:restored', { tick: snapshot.tick, reason: 'jump' });
    }
    this.clock.resume();
  }

  /**
   * Clear and repopulate the world, history and command queue together.
   */
  private resetWorld(): void {
    this.world.clear();
    populateWorld(this.world, this.scenario, this.config);
    this.history.clear();
    this.commandQueue = [];
    this.reverseExhausted = false;
    this.clock.resume();

    this.eventBus.emit('simulation:reset', {
      droneCount: this.world.drones.size,
      baseCount: this.world.bases.size,
    });
  }

  // ============================================================================
  // WORLD COMMANDS
  // ============================================================================

  private drainCommands(): void {
    if (this.commandQueue.length === 0) return;

    const queue = this.commandQueue;
    this.commandQueue = [];
    for (const command of queue) {
      const result = this.applyWorldCommand(command);
      this.eventBus.emit('command:applied', { command, result });
    }
  }

  /**
   * Split a command's drone ids into those it can act on and those it must
   * ignore. Only friendly drones take orders; duplicates count once.
   */
  private resolveTargets(command: WorldCommand): ResolvedTargets {
    const acceptedIds: string[] = [];
    const ignoredIds: string[] = [];

    if (command.type === 'SET_BASE' && !this.world.getBase(command.baseId)) {
      return { acceptedIds, ignoredIds: [...command.droneIds, command.baseId] };
    }

    const task = command.type === 'TASK' ? command.task : null;
    const targetId = task && (task.kind === 'tail' || task.kind === 'intercept') ? task.targetId : null;
    if (targetId !== null && task) {
      const target = this.world.getDrone(targetId);
      if (!target || (task.kind === 'intercept' && target.team !== 'enemy')) {
        return { acceptedIds, ignoredIds: [...command.droneIds, targetId] };
      }
    }

    for (const id of command.droneIds) {
      if (acceptedIds.includes(id) || ignoredIds.includes(id)) continue;

      const drone = this.world.getDrone(id);
      const controllable = command.type === 'SET_BASE' || drone?.team === 'friendly';
      const hasBase = task?.kind !== 'return_to_base' || (drone?.baseId != null && this.world.getBase(drone.baseId) !== undefined);

      if (!drone || !controllable || !hasBase || id === targetId) {
        ignoredIds.push(id);
      } else {
        acceptedIds.push(id);
      }
    }

    return { acceptedIds, ignoredIds };
  }

  private applyWorldCommand(command: WorldCommand): CommandSuccess {
    const targets = this.resolveTargets(command);
    const result: CommandSuccess = { success: true, command: command.type, ...targets, queued: false };

    switch (command.type) {
      case 'MOVE':
        result.groupId = this.applyMove(targets.acceptedIds, command.target);
        break;
      case 'TASK':
        result.groupId = this.applyTask(targets.acceptedIds, command.task);
        break;
      case 'SET_BASE':
        for (const id of targets.acceptedIds) {
          const drone = this.world.getDrone(id);
          if (drone) drone.baseId = command.baseId;
        }
        break;
    }

    if (targets.ignoredIds.length > 0) {
      debugCommands.log(`[Simulation] ${command.type} ignored unknown references: ${targets.ignoredIds.join(', ')}`);
    }
    return result;
  }

  /**
   * Detach a drone from whatever it was doing: group, target, pattern, pursuit.
   */
  private release(drone: Drone): void {
    const emptiedGroupId = this.world.leaveGroup(drone);
    if (emptiedGroupId !== null) {
      this.eventBus.emit('group:discarded', { groupId: emptiedGroupId, reason: 'members_reassigned' });
    }
    setIdle(drone);
  }

  private applyMove(droneIds: string[], target: Point): number | undefined {
    const drones = this.lookup(droneIds);
    if (drones.length === 0) return undefined;

    const destination = {
      x: clamp(target.x, 0, this.world.width),
      y: clamp(target.y, 0, this.world.height),
    };

    for (const drone of drones) {
      this.release(drone);
      drone.mode = 'moving';
      drone.target = { x: destination.x, y: destination.y };
    }

    const { group } = this.world.createGroup(destination, drones.map((d) => d.id));
    this.eventBus.emit('group:created', {
      groupId: group.id,
      memberIds: [...group.memberIds],
      destination: { x: destination.x, y: destination.y },
    });
    return group.id;
  }

  private applyTask(droneIds: string[], task: Task): number | undefined {
    if (task.kind === 'move') {
      return this.applyMove(droneIds, task.target);
    }

    for (const drone of this.lookup(droneIds)) {
      this.release(drone);

      switch (task.kind) {
        case 'patrol':
          drone.pattern = clampPattern(task.pattern, this.world.width, this.world.height);
          drone.mode = 'patrolling';
          break;
        case 'tail':
          drone.tailTargetId = task.targetId;
          drone.tailDistance = task.distance ?? this.config.defaultTailDistance;
          drone.mode = 'tailing';
          break;
        case 'hold':
          drone.mode = 'holding';
          break;
        case 'return_to_base': {
          const base = drone.baseId !== null ? this.world.getBase(drone.baseId) : undefined;
          if (base) {
            drone.target = { x: base.x, y: base.y };
            drone.mode = 'returning';
          }
          break;
        }
        case 'intercept':
          drone.interceptTargetId = task.targetId;
          drone.mode = 'intercepting';
          break;
        case 'stop':
          break;
      }
    }
    return undefined;
  }

  private lookup(droneIds: string[]): Drone[] {
    const drones: Drone[] = [];
    for (const id of droneIds) {
      const drone = this.world.getDrone(id);
      if (drone) drones.push(drone);
    }
    return drones;
  }
}
