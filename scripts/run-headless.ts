/**
 * Run Headless - Drive a simulation from console commands on stdin
 *
 * Usage:
 *   npm run headless                       # interactive, ticking in real time
 *   npm run headless -- --ticks 500        # run 500 ticks, print status, exit
 *   npm run headless -- --scenario my.json < orders.txt
 *
 * Without --realtime, lines read from a pipe are executed in order; "step N"
 * advances time between them.
 */

import * as readline from 'readline';
import { Simulation } from '../src/engine/core/Simulation';
import { ConsoleEngine } from '../src/engine/debug/ConsoleEngine';
import { loadScenarioFile, DEFAULT_SCENARIO_PATH } from '../src/engine/scenario/ScenarioLoader';

interface HeadlessOptions {
  scenarioPath: string;
  ticks: number;
  realtime: boolean;
}

function parseOptions(argv: string[]): HeadlessOptions {
  const options: HeadlessOptions = {
    scenarioPath: DEFAULT_SCENARIO_PATH,
    ticks: 0,
    realtime: process.stdin.isTTY === true,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--scenario' && argv[i + 1]) {
      options.scenarioPath = argv[++i];
    } else if (arg === '--ticks' && argv[i + 1]) {
      options.ticks = Math.max(0, Math.floor(Number(argv[++i])) || 0);
      options.realtime = false;
    } else if (arg === '--realtime') {
      options.realtime = true;
    }
  }
  return options;
}

function print(text: string): void {
  if (text) console.log(text);
}

function main(): void {
  const options = parseOptions(process.argv.slice(2));
  const sim = new Simulation({ scenario: loadScenarioFile(options.scenarioPath) });
  const consoleEngine = new ConsoleEngine(sim);

  sim.eventBus.on('drone:destroyed', (data) => {
    print(`[tick ${data.tick}] ${data.droneId} destroyed (credited to ${data.creditedTo})`);
  });
  sim.eventBus.on('history:exhausted', (data) => {
    print(`[tick ${data.tick}] reached the start of recorded history`);
  });

  if (options.ticks > 0) {
    sim.run(options.ticks);
    print(consoleEngine.execute('status').message);
    return;
  }

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: options.realtime,
  });

  if (options.realtime) {
    sim.start();
    rl.setPrompt('> ');
    rl.prompt();
  }

  rl.on('line', (line) => {
    const input = line.trim();
    if (input === 'quit' || input === 'exit') {
      rl.close();
      return;
    }
    print(consoleEngine.execute(input).message);
    if (options.realtime) rl.prompt();
  });

  rl.on('close', () => {
    sim.dispose();
    if (!options.realtime) {
      print(consoleEngine.execute('status').message);
    }
  });
}

main();
