/**
 * Intent Normalizer
 *
 * Maps the loosely-typed classifier object onto one IntentRecord variant.
 * Every field is defaulted when missing or unusable, so normalization is
 * total: anything that cannot be classified becomes UNKNOWN.
 */

import { z } from 'zod';
import {
  TASK_ROLES,
  TASK_STATUSES,
  isIntentTag,
  isPlainObject,
  type IntentOf,
  type IntentRecord,
  type IntentTag,
  type TaskRole,
  type UnknownIntent,
} from '../../../../packages/shared-types/src';
import { parseDateInput } from './zoned-time';

export const DEFAULT_TASK_TITLE = 'Untitled Task';
export const DEFAULT_EVENT_MINUTES = 30;

export interface NormalizeContext {
  /** The original user message */
  message: string;
  /** Invocation time of the pipeline */
  now: Date;
  /** Classifier output as received, kept on UNKNOWN for audit */
  raw: string;
  timeZone: string;
  agentSource: string;
  fallbackEmail: string;
}

type Fields = Record<string, unknown>;

// ---------------- Field coercion ----------------------------------------------

const textOr = (fallback: string) => z.string().trim().min(1).catch(fallback);

const stringList = z
  .preprocess(
    (v) => (typeof v === 'string' ? v.split(/\r?\n/) : v),
    z.array(z.unknown()).transform((items) =>
      items
        .filter((item): item is string => typeof item === 'string')
        .map((item) => item.trim())
        .filter((item) => item.length > 0)
    )
  )
  .catch([]);

const roleField = z
  .string()
  .transform((v): TaskRole => TASK_ROLES.find((r) => r.toLowerCase() === v.trim().toLowerCase()) ?? 'Producer')
  .catch('Producer');

const statusField = z.enum(TASK_STATUSES).catch('To Do');

const xpField = z.coerce.number().finite().nonnegative().transform(Math.round).catch(0);

const priorityField = z
  .preprocess((v) => (typeof v === 'string' ? v.trim().toLowerCase() : v), z.enum(['low', 'normal', 'high']))
  .catch('normal');

function toSnakeCase(key: string): string {
  return key.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toLowerCase();
}

// Nested objects the classifier sometimes uses to group a variant's fields
const NESTED_KEYS = ['task', 'details'];

/**
 * Flatten nested detail objects and convert keys to snake_case.
 * Top-level keys win over nested ones.
 */
export function flattenFields(parsed: Record<string, unknown>): Fields {
  const fields: Fields = {};

  for (const nestedKey of NESTED_KEYS) {
    const nested = parsed[nestedKey];
    if (isPlainObject(nested)) {
      for (const [key, value] of Object.entries(nested)) {
        fields[toSnakeCase(key)] = value;
      }
    }
  }

  for (const [key, value] of Object.entries(parsed)) {
    if (NESTED_KEYS.includes(key) && isPlainObject(value)) {
      continue;
    }
    fields[toSnakeCase(key)] = value;
  }

  return fields;
}

/** First present, non-null value among the aliases */
function pick(fields: Fields, ...keys: string[]): unknown {
  for (const key of keys) {
    const value = fields[key];
    if (value !== undefined && value !== null) {
      return value;
    }
  }
  return undefined;
}

/**
 * Read the intent tag case-insensitively; "complete task" and
 * "complete-task" both map to COMPLETE_TASK.
 */
export function readIntentTag(value: unknown): IntentTag | null {
  if (typeof value !== 'string') {
    return null;
  }
  const tag = value.trim().toUpperCase().replace(/[\s-]+/g, '_');
  return isIntentTag(tag) ? tag : null;
}

export function unknownIntent(message: string, raw: string, reason: string): UnknownIntent {
  return { intent: 'UNKNOWN', message, raw, reason };
}

// ---------------- Per-variant normalizers --------------------------------------

type ClassifiedTag = Exclude<IntentTag, 'UNKNOWN'>;

type Normalizer<K extends ClassifiedTag> = (
  fields: Fields,
  ctx: NormalizeContext
) => IntentOf<K> | UnknownIntent;

const NORMALIZERS: { [K in ClassifiedTag]: Normalizer<K> } = {
  TASK: (f, ctx) => {
    const due = parseDateInput(pick(f, 'due_date', 'datetime_iso', 'due', 'deadline'), ctx.timeZone);

    return {
      intent: 'TASK',
      title: textOr(DEFAULT_TASK_TITLE).parse(pick(f, 'title', 'name')),
      result: textOr('').parse(pick(f, 'result', 'expected_result')),
      purpose: textOr('').parse(f.purpose),
      actionPlan: stringList.parse(pick(f, 'action_plan', 'steps')),
      role: roleField.parse(f.role),
      status: statusField.parse(f.status),
      // Past or unresolvable due dates fall back to the invocation time
      dueDate: due && due.getTime() >= ctx.now.getTime() ? due : ctx.now,
      xp: xpField.parse(f.xp),
      context: ctx.message,
      source: ctx.agentSource,
    };
  },

  COMPLETE_TASK: (f, ctx) => {
    const taskName = textOr('').parse(pick(f, 'task_name', 'title', 'task', 'name'));
    if (!taskName) {
      return unknownIntent(ctx.message, ctx.raw, 'COMPLETE_TASK without a task name');
    }
    return {
      intent: 'COMPLETE_TASK',
      taskName,
      status: 'Completed',
      context: ctx.message,
      source: ctx.agentSource,
    };
  },

  CALENDAR: (f, ctx) => {
    const start = parseDateInput(pick(f, 'start', 'start_time', 'datetime_iso', 'date'), ctx.timeZone);
    let end = parseDateInput(pick(f, 'end', 'end_time'), ctx.timeZone);
    if (start && (!end || end.getTime() <= start.getTime())) {
      end = new Date(start.getTime() + DEFAULT_EVENT_MINUTES * 60_000);
    }

    return {
      intent: 'CALENDAR',
      title: textOr(ctx.message).parse(pick(f, 'title', 'summary')),
      start,
      end,
      description: textOr('').parse(f.description),
      attendees: stringList.parse(f.attendees),
      context: ctx.message,
      source: ctx.agentSource,
    };
  },

  EMAIL: (f, ctx) => ({
    intent: 'EMAIL',
    to: textOr(ctx.fallbackEmail).parse(pick(f, 'to', 'recipient')),
    subject: textOr('').parse(f.subject),
    body: textOr('').parse(f.body),
    context: ctx.message,
    source: ctx.agentSource,
  }),

  RESEARCH: (f, ctx) => {
    const topic = textOr('').parse(f.topic);
    return {
      intent: 'RESEARCH',
      topic,
      query: textOr(topic || ctx.message).parse(pick(f, 'query', 'question', 'data')),
      context: ctx.message,
      source: ctx.agentSource,
    };
  },

  MESSAGE: (f, ctx) => ({
    intent: 'MESSAGE',
    text: textOr(ctx.message).parse(pick(f, 'text', 'message')),
    priority: priorityField.parse(f.priority),
    context: ctx.message,
    source: ctx.agentSource,
  }),
};

function normalizeAs<K extends ClassifiedTag>(tag: K, fields: Fields, ctx: NormalizeContext): IntentRecord {
  const normalizer: Normalizer<K> = NORMALIZERS[tag];
  return normalizer(fields, ctx);
}

/**
 * Normalize a sanitized classifier object. Never throws.
 */
export function normalizeIntent(parsed: Record<string, unknown>, ctx: NormalizeContext): IntentRecord {
  const fields = flattenFields(parsed);
  const tag = readIntentTag(fields.intent);

  if (!tag) {
    const reason =
      fields.intent === undefined ? 'Missing intent' : `Unrecognized intent: ${String(fields.intent)}`;
    return unknownIntent(ctx.message, ctx.raw, reason);
  }

  if (tag === 'UNKNOWN') {
    return unknownIntent(ctx.message, ctx.raw, 'Classifier returned UNKNOWN');
  }

  return normalizeAs(tag, fields, ctx);
}
