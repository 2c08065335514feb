/**
 * Framework layouts - how each productivity framework arranges a list's items
 *
 * Every framework key maps to exactly one layout. Category layouts place an
 * item in one named zone; the timebox layout gives each item a minute budget
 * and a status that cycles idle → running → done → idle.
 *
 * @module frameworks
 */

import { z } from 'zod';

export const FRAMEWORK_KEYS = [
  'eisenhower',
  'timeboxing',
  'impact_effort',
  'kanban',
  'stop_doing',
  'pareto',
] as const;

export type FrameworkKey = (typeof FRAMEWORK_KEYS)[number];

export function isFrameworkKey(value: unknown): value is FrameworkKey {
  return FRAMEWORK_KEYS.some((key) => key === value);
}

/**
 * Stored per-item payload for one framework
 */
export type FrameworkData = Record<string, string | number>;

/**
 * Stored payloads keyed by item id, as the API returns them
 */
export type FrameworkDataMap = Record<string, { data: FrameworkData } | undefined>;

/**
 * Anything with an id can be placed on a board
 */
export interface Placeable {
  id: number;
}

export interface Zone {
  id: string;
  label: string;
}

/**
 * Raised when a payload does not fit a framework
 */
export class FrameworkDataError extends Error {
  constructor(
    public readonly framework: FrameworkKey,
    message: string
  ) {
    super(message);
    this.name = 'FrameworkDataError';
  }
}

export const UNASSIGNED = 'unassigned';

export interface CategoryLayout {
  kind: 'category';
  key: Exclude<FrameworkKey, 'timeboxing'>;
  field: 'quadrant' | 'column' | 'category';
  zones: readonly Zone[];
  /**
   * Zone of items without stored data. `unassigned` unless the framework
   * starts every item in a real zone.
   */
  defaultZone: string;
}

export const TIMEBOX_STATUSES = ['idle', 'running', 'done'] as const;
export type TimeboxStatus = (typeof TIMEBOX_STATUSES)[number];

export interface TimeboxLayout {
  kind: 'timebox';
  key: 'timeboxing';
  minMinutes: number;
  maxMinutes: number;
  defaultMinutes: number;
  statuses: readonly TimeboxStatus[];
}

export type FrameworkLayout = CategoryLayout | TimeboxLayout;

export const LAYOUTS = {
  eisenhower: {
    kind: 'category',
    key: 'eisenhower',
    field: 'quadrant',
    zones: [
      { id: 'do', label: 'Do It Now' },
      { id: 'schedule', label: 'Schedule It' },
      { id: 'delegate', label: 'Delegate It' },
      { id: 'eliminate', label: 'Eliminate It' },
    ],
    defaultZone: UNASSIGNED,
  },
  timeboxing: {
    kind: 'timebox',
    key: 'timeboxing',
    minMinutes: 5,
    maxMinutes: 480,
    defaultMinutes: 30,
    statuses: TIMEBOX_STATUSES,
  },
  impact_effort: {
    kind: 'category',
    key: 'impact_effort',
    field: 'quadrant',
    zones: [
      { id: 'quickwin', label: 'Quick / Easy Wins' },
      { id: 'major', label: 'Major Projects' },
      { id: 'fillin', label: 'Fill-in Tasks' },
      { id: 'thankless', label: 'Thankless Tasks' },
    ],
    defaultZone: UNASSIGNED,
  },
  kanban: {
    kind: 'category',
    key: 'kanban',
    field: 'column',
    zones: [
      { id: 'backlog', label: 'Backlog' },
      { id: 'doing', label: 'Doing' },
      { id: 'review', label: 'Review' },
      { id: 'done', label: 'Done' },
    ],
    defaultZone: 'backlog',
  },
  stop_doing: {
    kind: 'category',
    key: 'stop_doing',
    field: 'category',
    zones: [
      { id: 'keep', label: 'Keep Doing' },
      { id: 'stop', label: 'Stop Doing' },
    ],
    defaultZone: UNASSIGNED,
  },
  pareto: {
    kind: 'category',
    key: 'pareto',
    field: 'category',
    zones: [
      { id: 'vital', label: 'Vital Few (20%)' },
      { id: 'trivial', label: 'Trivial Many (80%)' },
    ],
    defaultZone: UNASSIGNED,
  },
} as const satisfies { [K in FrameworkKey]: FrameworkLayout & { key: K } };

export function getLayout(key: FrameworkKey): FrameworkLayout {
  return LAYOUTS[key];
}

/**
 * Zone ids an item may be stored in, including `unassigned` where allowed
 */
export function zoneIds(layout: CategoryLayout): string[] {
  const ids = layout.zones.map((zone) => zone.id);
  return layout.defaultZone === UNASSIGNED ? [...ids, UNASSIGNED] : ids;
}

/**
 * Zone an item currently sits in
 */
export function zoneOf(layout: CategoryLayout, data: FrameworkData | undefined): string {
  const value = data?.[layout.field];
  return typeof value === 'string' && zoneIds(layout).includes(value) ? value : layout.defaultZone;
}

export function minutesOf(layout: TimeboxLayout, data: FrameworkData | undefined): number {
  const value = data?.minutes;
  return typeof value === 'number' && value > 0 ? value : layout.defaultMinutes;
}

export function statusOf(data: FrameworkData | undefined): TimeboxStatus {
  const value = data?.status;
  return TIMEBOX_STATUSES.find((status) => status === value) ?? 'idle';
}

/**
 * The status a timebox moves to when clicked
 */
export function nextStatus(status: TimeboxStatus): TimeboxStatus {
  switch (status) {
    case 'idle':
      return 'running';
    case 'running':
      return 'done';
    case 'done':
      return 'idle';
  }
}

/**
 * Sum of every item's budget, counting items without one at the default
 */
export function totalMinutes(items: readonly Placeable[], data: FrameworkDataMap): number {
  const layout = LAYOUTS.timeboxing;
  return items.reduce((sum, item) => sum + minutesOf(layout, data[String(item.id)]?.data), 0);
}

/**
 * `90` → `1h 30m`
 */
export function formatMinutes(total: number): string {
  return `${Math.floor(total / 60)}h ${total % 60}m`;
}

/**
 * Group items by zone (category layouts) or by status (timebox). Every zone
 * is present in the result, in display order, even when empty.
 */
export function partition<T extends Placeable>(
  layout: FrameworkLayout,
  items: readonly T[],
  data: FrameworkDataMap
): Map<string, T[]> {
  const groups = new Map<string, T[]>();

  switch (layout.kind) {
    case 'category':
      for (const id of zoneIds(layout)) {
        groups.set(id, []);
      }
      for (const item of items) {
        groups.get(zoneOf(layout, data[String(item.id)]?.data))?.push(item);
      }
      break;
    case 'timebox':
      for (const status of layout.statuses) {
        groups.set(status, []);
      }
      for (const item of items) {
        groups.get(statusOf(data[String(item.id)]?.data))?.push(item);
      }
      break;
  }

  return groups;
}

type PayloadSchema = z.ZodType<Partial<Record<string, string | number>>>;

function payloadSchema(layout: FrameworkLayout): PayloadSchema {
  switch (layout.kind) {
    case 'category': {
      const [first = UNASSIGNED, ...rest] = zoneIds(layout);
      const values: [string, ...string[]] = [first, ...rest];
      return z.object({ [layout.field]: z.enum(values) }).partial().strict();
    }
    case 'timebox':
      return z
        .object({
          minutes: z.number().int().min(layout.minMinutes).max(layout.maxMinutes),
          status: z.enum(TIMEBOX_STATUSES),
        })
        .partial()
        .strict();
  }
}

/**
 * Check a partial payload before sending it. Accepts exactly what the
 * server accepts for the framework.
 */
export function validate(layout: FrameworkLayout, payload: unknown): FrameworkData {
  const result = payloadSchema(layout).safeParse(payload ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new FrameworkDataError(layout.key, issue ? issue.message : 'Invalid payload');
  }

  const data: FrameworkData = {};
  for (const [field, value] of Object.entries(result.data)) {
    if (value !== undefined) {
      data[field] = value;
    }
  }
  return data;
}

/**
 * Payload that moves an item to a zone of a category layout
 */
export function placement(layout: CategoryLayout, zone: string): FrameworkData {
  return validate(layout, { [layout.field]: zone });
}
