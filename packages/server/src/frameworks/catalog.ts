/**
 * The fixed catalog of productivity frameworks and the payload each accepts
 * @module frameworks/catalog
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';

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
 * A framework that places each item in one named zone
 */
export interface CategoryLayout {
  kind: 'category';
  field: 'quadrant' | 'column' | 'category';
  values: readonly string[];
  defaultValue: string;
}

/**
 * Timeboxing: an open minute budget plus a manually cycled status
 */
export interface TimeboxLayout {
  kind: 'timebox';
  minutes: { min: number; max: number; default: number };
  statuses: readonly ['idle', 'running', 'done'];
}

export interface FrameworkDefinition {
  key: FrameworkKey;
  name: string;
  author: string;
  description: string;
  icon: string;
  color: string;
  layout: CategoryLayout | TimeboxLayout;
}

const EISENHOWER = ['do', 'schedule', 'delegate', 'eliminate'] as const;
const IMPACT_EFFORT = ['quickwin', 'major', 'fillin', 'thankless'] as const;
const KANBAN = ['backlog', 'doing', 'review', 'done'] as const;
const STOP_DOING = ['keep', 'stop'] as const;
const PARETO = ['vital', 'trivial'] as const;
export const TIMEBOX_STATUSES = ['idle', 'running', 'done'] as const;

export const FRAMEWORKS: Record<FrameworkKey, FrameworkDefinition> = {
  eisenhower: {
    key: 'eisenhower',
    name: 'Eisenhower Matrix',
    author: 'Dwight D. Eisenhower',
    description: 'Sort tasks by urgent vs important to stop treating everything like an emergency.',
    icon: '📋',
    color: '#6366f1',
    layout: { kind: 'category', field: 'quadrant', values: EISENHOWER, defaultValue: 'unassigned' },
  },
  timeboxing: {
    key: 'timeboxing',
    name: 'Timeboxing',
    author: 'James Martin',
    description: 'Give tasks a fixed time limit so they can’t expand and swallow your whole week.',
    icon: '⏱️',
    color: '#f59e0b',
    layout: { kind: 'timebox', minutes: { min: 5, max: 480, default: 30 }, statuses: TIMEBOX_STATUSES },
  },
  impact_effort: {
    key: 'impact_effort',
    name: 'Impact / Effort Matrix',
    author: 'Lean / Agile practices',
    description: 'Rank tasks by impact vs effort to pick the work that actually moves things forward.',
    icon: '📊',
    color: '#10b981',
    layout: { kind: 'category', field: 'quadrant', values: IMPACT_EFFORT, defaultValue: 'unassigned' },
  },
  kanban: {
    key: 'kanban',
    name: 'Kanban Board',
    author: 'Taiichi Ohno',
    description: 'Track tasks through stages so you can see what’s stuck.',
    icon: '📌',
    color: '#3b82f6',
    layout: { kind: 'category', field: 'column', values: KANBAN, defaultValue: 'backlog' },
  },
  stop_doing: {
    key: 'stop_doing',
    name: 'Stop Doing List',
    author: 'Jim Collins',
    description: 'Win by removing commitments instead of stacking more on top.',
    icon: '🚫',
    color: '#ef4444',
    layout: { kind: 'category', field: 'category', values: STOP_DOING, defaultValue: 'unassigned' },
  },
  pareto: {
    key: 'pareto',
    name: '80/20 Principle',
    author: 'Vilfredo Pareto',
    description: 'Focus on the 20% of inputs that drive 80% of results.',
    icon: '🎯',
    color: '#8b5cf6',
    layout: { kind: 'category', field: 'category', values: PARETO, defaultValue: 'unassigned' },
  },
};

/**
 * Stored per-item payload for one framework
 */
export type FrameworkData = Record<string, string | number>;

// Every field is optional because writes are partial and merged
const payloadSchemas = {
  eisenhower: z.object({ quadrant: z.enum([...EISENHOWER, 'unassigned']) }).partial().strict(),
  impact_effort: z.object({ quadrant: z.enum([...IMPACT_EFFORT, 'unassigned']) }).partial().strict(),
  kanban: z.object({ column: z.enum(KANBAN) }).partial().strict(),
  stop_doing: z.object({ category: z.enum([...STOP_DOING, 'unassigned']) }).partial().strict(),
  pareto: z.object({ category: z.enum([...PARETO, 'unassigned']) }).partial().strict(),
  timeboxing: z
    .object({
      minutes: z.number().int().min(5).max(480),
      status: z.enum(TIMEBOX_STATUSES),
    })
    .partial()
    .strict(),
} satisfies Record<FrameworkKey, z.ZodTypeAny>;

/**
 * Parse a framework key taken from a URL or body
 */
export function parseFrameworkKey(value: unknown): FrameworkKey {
  if (!isFrameworkKey(value)) {
    throw new ValidationError('Invalid framework');
  }
  return value;
}

/**
 * Validate a partial payload against the framework's accepted fields and values
 */
export function validateFrameworkData(key: FrameworkKey, payload: unknown): FrameworkData {
  const result = payloadSchemas[key].safeParse(payload ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(`Invalid ${FRAMEWORKS[key].name} data: ${issue ? issue.message : 'malformed payload'}`);
  }

  const data: FrameworkData = {};
  for (const [field, value] of Object.entries(result.data)) {
    if (typeof value === 'string' || typeof value === 'number') {
      data[field] = value;
    }
  }
  return data;
}

/**
 * Field-level merge of a partial payload into stored data
 */
export function mergeFrameworkData(stored: FrameworkData, patch: FrameworkData): FrameworkData {
  return { ...stored, ...patch };
}

/**
 * Parse stored JSON; anything but a flat object reads as empty
 */
export function parseStoredData(json: string): FrameworkData {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return {};
  }
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return {};
  }
  const data: FrameworkData = {};
  for (const [field, value] of Object.entries(parsed)) {
    if (typeof value === 'string' || typeof value === 'number') {
      data[field] = value;
    }
  }
  return data;
}
