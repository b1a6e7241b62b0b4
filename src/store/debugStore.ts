import { createStore } from 'zustand/vanilla';

export interface DebugSettings {
  debugEnabled: boolean;
  debugSimulation: boolean;
  debugMovement: boolean;
  debugIntercept: boolean;
  debugTail: boolean;
  debugCombat: boolean;
  debugFormation: boolean;
  debugHistory: boolean;
  debugCommands: boolean;
  debugPerformance: boolean;
}

export type DebugSettingKey = Exclude<keyof DebugSettings, 'debugEnabled'>;

export interface DebugState {
  debugSettings: DebugSettings;
  setDebugSettings: (settings: Partial<DebugSettings>) => void;
  resetDebugSettings: () => void;
}

export const DEFAULT_DEBUG_SETTINGS: DebugSettings = {
  debugEnabled: false,
  debugSimulation: false,
  debugMovement: false,
  debugIntercept: false,
  debugTail: false,
  debugCombat: false,
  debugFormation: false,
  debugHistory: false,
  debugCommands: false,
  debugPerformance: false,
};

const SETTING_KEYS: Record<string, DebugSettingKey> = {
  simulation: 'debugSimulation',
  movement: 'debugMovement',
  intercept: 'debugIntercept',
  tail: 'debugTail',
  combat: 'debugCombat',
  formation: 'debugFormation',
  history: 'debugHistory',
  commands: 'debugCommands',
  performance: 'debugPerformance',
};

/**
 * Parse a DRONE_SIM_DEBUG value ("all" or a comma list such as "combat,history")
 * into debug settings. Unknown category names are ignored.
 */
export function parseDebugEnv(value: string | undefined): DebugSettings {
  const settings: DebugSettings = { ...DEFAULT_DEBUG_SETTINGS };
  if (!value) return settings;

  const names = value.split(',').map((name) => name.trim().toLowerCase()).filter(Boolean);
  if (names.length === 0) return settings;

  settings.debugEnabled = true;
  for (const name of names) {
    if (name === 'all') {
      for (const key of Object.values(SETTING_KEYS)) {
        settings[key] = true;
      }
      continue;
    }
    const key = SETTING_KEYS[name];
    if (key) settings[key] = true;
  }
  return settings;
}

export const debugStore = createStore<DebugState>()((set) => ({
  debugSettings: parseDebugEnv(process.env.DRONE_SIM_DEBUG),

  setDebugSettings: (settings) =>
    set((state) => ({ debugSettings: { ...state.debugSettings, ...settings } })),

  resetDebugSettings: () => set({ debugSettings: { ...DEFAULT_DEBUG_SETTINGS } }),
}));
