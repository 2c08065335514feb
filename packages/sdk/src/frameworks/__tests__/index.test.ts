/**
 * Frameworks module unit tests
 */
import { describe, it, expect } from 'vitest';
import {
  FrameworkDataError,
  formatMinutes,
  getLayout,
  isFrameworkKey,
  LAYOUTS,
  nextStatus,
  partition,
  placement,
  totalMinutes,
  validate,
  zoneIds,
  zoneOf,
  type FrameworkDataMap,
} from '../index.js';

const items = [{ id: 1 }, { id: 2 }, { id: 3 }, { id: 4 }];

describe('layouts', () => {
  it('should recognise catalog keys only', () => {
    expect(isFrameworkKey('kanban')).toBe(true);
    expect(isFrameworkKey('gtd')).toBe(false);
    expect(isFrameworkKey(undefined)).toBe(false);
  });

  it('should offer unassigned everywhere but kanban', () => {
    expect(zoneIds(LAYOUTS.eisenhower)).toEqual(['do', 'schedule', 'delegate', 'eliminate', 'unassigned']);
    expect(zoneIds(LAYOUTS.kanban)).toEqual(['backlog', 'doing', 'review', 'done']);
  });

  it('should place items without data in the default zone', () => {
    expect(zoneOf(LAYOUTS.kanban, undefined)).toBe('backlog');
    expect(zoneOf(LAYOUTS.pareto, {})).toBe('unassigned');
    expect(zoneOf(LAYOUTS.pareto, { category: 'bogus' })).toBe('unassigned');
    expect(zoneOf(LAYOUTS.pareto, { category: 'vital' })).toBe('vital');
  });

  it('should return the layout for a key', () => {
    expect(getLayout('timeboxing')).toBe(LAYOUTS.timeboxing);
  });
});

describe('partition', () => {
  it('should group items by zone with every zone present', () => {
    const data: FrameworkDataMap = {
      '1': { data: { quadrant: 'do' } },
      '2': { data: { quadrant: 'eliminate' } },
      '3': { data: { quadrant: 'do' } },
    };

    const groups = partition(LAYOUTS.eisenhower, items, data);

    expect([...groups.keys()]).toEqual(['do', 'schedule', 'delegate', 'eliminate', 'unassigned']);
    expect(groups.get('do')).toEqual([{ id: 1 }, { id: 3 }]);
    expect(groups.get('schedule')).toEqual([]);
    expect(groups.get('eliminate')).toEqual([{ id: 2 }]);
    expect(groups.get('unassigned')).toEqual([{ id: 4 }]);
  });

  it('should group timeboxes by status', () => {
    const data: FrameworkDataMap = {
      '1': { data: { status: 'running', minutes: 25 } },
      '2': { data: { status: 'done' } },
    };

    const groups = partition(LAYOUTS.timeboxing, items, data);

    expect(groups.get('idle')).toEqual([{ id: 3 }, { id: 4 }]);
    expect(groups.get('running')).toEqual([{ id: 1 }]);
    expect(groups.get('done')).toEqual([{ id: 2 }]);
  });
});

describe('timeboxing', () => {
  it('should cycle idle, running, done', () => {
    expect(nextStatus('idle')).toBe('running');
    expect(nextStatus('running')).toBe('done');
    expect(nextStatus('done')).toBe('idle');
  });

  it('should total budgets with the default for items without one', () => {
    const data: FrameworkDataMap = {
      '1': { data: { minutes: 45 } },
      '2': { data: { minutes: 15 } },
    };

    expect(totalMinutes(items, data)).toBe(45 + 15 + 30 + 30);
  });

  it('should format minutes as hours and minutes', () => {
    expect(formatMinutes(90)).toBe('1h 30m');
    expect(formatMinutes(45)).toBe('0h 45m');
    expect(formatMinutes(120)).toBe('2h 0m');
  });
});

describe('validate', () => {
  it('should accept what the server accepts', () => {
    expect(validate(LAYOUTS.kanban, { column: 'review' })).toEqual({ column: 'review' });
    expect(validate(LAYOUTS.timeboxing, { minutes: 60, status: 'idle' })).toEqual({ minutes: 60, status: 'idle' });
    expect(validate(LAYOUTS.stop_doing, undefined)).toEqual({});
  });

  it('should reject values outside the layout', () => {
    expect(() => validate(LAYOUTS.kanban, { column: 'unassigned' })).toThrow(FrameworkDataError);
    expect(() => validate(LAYOUTS.timeboxing, { minutes: 500 })).toThrow(FrameworkDataError);
    expect(() => validate(LAYOUTS.eisenhower, { column: 'do' })).toThrow(FrameworkDataError);
  });

  it('should name the framework on failure', () => {
    try {
      validate(LAYOUTS.pareto, { category: 'most' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(FrameworkDataError);
      expect(error).toMatchObject({ framework: 'pareto', name: 'FrameworkDataError' });
    }
  });

  it('should build placements for a zone', () => {
    expect(placement(LAYOUTS.impact_effort, 'quickwin')).toEqual({ quadrant: 'quickwin' });
    expect(() => placement(LAYOUTS.impact_effort, 'someday')).toThrow(FrameworkDataError);
  });
});
