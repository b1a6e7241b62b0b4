import { debugStore, type DebugSettingKey } from '@/store/debugStore';

export type DebugCategory =
  | 'simulation'
  | 'movement'
  | 'intercept'
  | 'tail'
  | 'combat'
  | 'formation'
  | 'history'
  | 'commands'
  | 'performance';

// Map category names to debug settings keys
const categoryToSettingKey: Record<DebugCategory, DebugSettingKey> = {
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
 * Check if debugging is enabled for a specific category
 */
function isEnabled(category: DebugCategory): boolean {
  const debugSettings = debugStore.getState().debugSettings;

  // Check master toggle first
  if (!debugSettings.debugEnabled) {
    return false;
  }

  return debugSettings[categoryToSettingKey[category]];
}

/**
 * Debug logger that respects the debug settings store.
 * Only logs when both the master debug toggle and the specific category are enabled.
 */
export const debugLog = {
  log(category: DebugCategory, ...args: unknown[]): void {
    if (isEnabled(category)) {
      // eslint-disable-next-line no-console -- Debug logger intentionally uses console.log
      console.log(...args);
    }
  },

  warn(category: DebugCategory, ...args: unknown[]): void {
    if (isEnabled(category)) {
      console.warn(...args);
    }
  },

  error(category: DebugCategory, ...args: unknown[]): void {
    if (isEnabled(category)) {
      console.error(...args);
    }
  },

  /**
   * Check if a category is enabled (useful for expensive debug operations)
   */
  isEnabled,
};

// Category-specific logger interface
export interface CategoryLogger {
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  isEnabled: () => boolean;
}

/**
 * Factory function to create category-specific loggers.
 */
function createCategoryLogger(category: DebugCategory): CategoryLogger {
  return {
    log: (...args: unknown[]) => debugLog.log(category, ...args),
    warn: (...args: unknown[]) => debugLog.warn(category, ...args),
    error: (...args: unknown[]) => debugLog.error(category, ...args),
    isEnabled: () => isEnabled(category),
  };
}

export const debugSimulation = createCategoryLogger('simulation');
export const debugMovement = createCategoryLogger('movement');
export const debugIntercept = createCategoryLogger('intercept');
export const debugTail = createCategoryLogger('tail');
export const debugCombat = createCategoryLogger('combat');
export const debugFormation = createCategoryLogger('formation');
export const debugHistory = createCategoryLogger('history');
export const debugCommands = createCategoryLogger('commands');
export const debugPerformance = createCategoryLogger('performance');
