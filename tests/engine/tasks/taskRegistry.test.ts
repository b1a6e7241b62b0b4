import { describe, it, expect } from 'vitest';
import { isTaskName, parseTask, TASK_NAMES, TASK_DEFINITIONS } from '@/engine/tasks/TaskRegistry';

describe('TaskRegistry', () => {
  it('lists every defined task', () => {
    expect([...TASK_NAMES].sort()).toEqual(Object.keys(TASK_DEFINITIONS).sort());
  });

  it('recognises task names', () => {
    expect(isTaskName('intercept')).toBe(true);
    expect(isTaskName('toString')).toBe(false);
    expect(isTaskName('dance')).toBe(false);
  });

  it('builds a move task from target coordinates', () => {
    expect(parseTask('move', { target_x: 10, target_y: 20 })).toEqual({
      success: true,
      task: { kind: 'move', target: { x: 10, y: 20 } },
    });
  });

  it('builds a patrol task starting at the first waypoint', () => {
    expect(parseTask('patrol', { points: [{ x: 1, y: 2 }, { x: 3, y: 4 }] })).toEqual({
      success: true,
      task: {
        kind: 'patrol',
        pattern: { kind: 'waypoints', points: [{ x: 1, y: 2 }, { x: 3, y: 4 }], index: 0 },
      },
    });
  });

  it('leaves the tail distance to the default when omitted', () => {
    expect(parseTask('tail', { target_id: 'enemy_1' })).toEqual({
      success: true,
      task: { kind: 'tail', targetId: 'enemy_1', distance: null },
    });
    expect(parseTask('tail', { target_id: 'enemy_1', distance: 60 })).toEqual({
      success: true,
      task: { kind: 'tail', targetId: 'enemy_1', distance: 60 },
    });
  });

  it('accepts parameterless tasks without parameters', () => {
    expect(parseTask('hold', undefined)).toEqual({ success: true, task: { kind: 'hold' } });
    expect(parseTask('return_to_base', {})).toEqual({ success: true, task: { kind: 'return_to_base' } });
    expect(parseTask('stop', { extra: true })).toEqual({ success: true, task: { kind: 'stop' } });
  });

  it('rejects unknown task names', () => {
    const result = parseTask('dance', {});

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBe('unknown_task');
    expect(result.message).toBe(
      'Unknown task "dance". Known tasks: move, patrol, tail, hold, return_to_base, intercept, stop'
    );
  });

  it('reports schema issues by parameter path', () => {
    const result = parseTask('move', { target_x: 10 });

    expect(result).toEqual({
      success: false,
      error: 'schema',
      message: 'Invalid parameters for task "move"',
      issues: ['target_y: Required'],
    });
  });

  it('rejects an empty patrol route', () => {
    const result = parseTask('patrol', { points: [] });

    expect(result.success).toBe(false);
    if (result.success || result.error !== 'schema') return;
    expect(result.issues).toEqual(['points: Array must contain at least 1 element(s)']);
  });
});
