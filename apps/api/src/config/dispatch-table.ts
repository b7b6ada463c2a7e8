/**
 * Dispatch Table
 *
 * Declares, per intent tag, what gets persisted, which handler receives the
 * payload and which link is reconciled from the handler's answer. The router
 * interprets this table; it has no per-intent branches of its own.
 */

import type {
  HandlerKind,
  IntentOf,
  IntentTag,
  NewTaskRecord,
  TaskRecord,
} from '../../../../packages/shared-types/src';
import { DEFAULT_EVENT_MINUTES } from '../services/intent-normalizer';
import type { LinkKind } from '../services/reconciliation-linker';
import { formatInTimeZone } from '../services/zoned-time';

export type IntentMap = { [K in IntentTag]: IntentOf<K> };

export interface PayloadContext {
  timeZone: string;
  /** The record created or matched for this request, when there is one */
  record: TaskRecord | null;
}

export type PersistenceRule<I> =
  | { mode: 'create'; toRecord: (intent: I, now: Date) => NewTaskRecord }
  | { mode: 'complete'; lookupTitle: (intent: I) => string }
  | { mode: 'none' };

export interface DispatchRule<I> {
  persistence: PersistenceRule<I>;
  forwardTo: HandlerKind | null;
  toPayload: (intent: I, ctx: PayloadContext) => Record<string, unknown>;
  linkAs: LinkKind | null;
}

export type DispatchTable = { [K in IntentTag]: DispatchRule<IntentMap[K]> };

function zoned(date: Date | null, timeZone: string): string | null {
  return date ? formatInTimeZone(date, timeZone) : null;
}

export const DISPATCH_TABLE: DispatchTable = {
  TASK: {
    persistence: {
      mode: 'create',
      toRecord: (intent, now) => ({
        title: intent.title,
        result: intent.result,
        purpose: intent.purpose,
        actionPlan: intent.actionPlan,
        role: intent.role,
        status: intent.status,
        dueDate: intent.dueDate,
        xp: intent.xp,
        source: intent.source,
        context: intent.context,
        createdAt: now,
      }),
    },
    forwardTo: 'calendar',
    toPayload: (intent, ctx) => ({
      taskId: ctx.record?.id ?? null,
      title: intent.title,
      description: [intent.result, intent.purpose].filter(Boolean).join('\n'),
      start: zoned(intent.dueDate, ctx.timeZone),
      end: zoned(new Date(intent.dueDate.getTime() + DEFAULT_EVENT_MINUTES * 60_000), ctx.timeZone),
      timezone: ctx.timeZone,
      context: intent.context,
      source: intent.source,
    }),
    linkAs: 'calendar',
  },

  COMPLETE_TASK: {
    persistence: { mode: 'complete', lookupTitle: (intent) => intent.taskName },
    forwardTo: 'experience',
    toPayload: (intent, ctx) => ({
      taskId: ctx.record?.id ?? null,
      title: ctx.record?.title ?? intent.taskName,
      role: ctx.record?.role ?? null,
      xp: ctx.record?.xp ?? 0,
      status: intent.status,
      context: intent.context,
      source: intent.source,
    }),
    linkAs: null,
  },

  CALENDAR: {
    persistence: {
      mode: 'create',
      toRecord: (intent, now) => ({
        title: intent.title,
        result: '',
        purpose: intent.description,
        actionPlan: [],
        role: 'Producer',
        status: 'To Do',
        dueDate: intent.start,
        xp: 0,
        source: intent.source,
        context: intent.context,
        createdAt: now,
      }),
    },
    forwardTo: 'calendar',
    toPayload: (intent, ctx) => ({
      taskId: ctx.record?.id ?? null,
      title: intent.title,
      description: intent.description,
      start: zoned(intent.start, ctx.timeZone),
      end: zoned(intent.end, ctx.timeZone),
      attendees: intent.attendees,
      timezone: ctx.timeZone,
      context: intent.context,
      source: intent.source,
    }),
    linkAs: 'calendar',
  },

  EMAIL: {
    persistence: {
      mode: 'create',
      toRecord: (intent, now) => ({
        title: intent.subject ? `Email to ${intent.to}: ${intent.subject}` : `Email to ${intent.to}`,
        result: '',
        purpose: intent.subject,
        actionPlan: [],
        role: 'Producer',
        status: 'To Do',
        dueDate: null,
        xp: 0,
        source: intent.source,
        context: intent.context,
        createdAt: now,
      }),
    },
    forwardTo: 'email',
    toPayload: (intent, ctx) => ({
      taskId: ctx.record?.id ?? null,
      to: intent.to,
      subject: intent.subject,
      body: intent.body,
      context: intent.context,
      source: intent.source,
    }),
    linkAs: 'email',
  },

  RESEARCH: {
    persistence: { mode: 'none' },
    forwardTo: 'research',
    toPayload: (intent) => ({
      topic: intent.topic,
      query: intent.query,
      context: intent.context,
      source: intent.source,
    }),
    linkAs: null,
  },

  MESSAGE: {
    persistence: { mode: 'none' },
    forwardTo: 'message',
    toPayload: (intent) => ({
      text: intent.text,
      priority: intent.priority,
      context: intent.context,
      source: intent.source,
    }),
    linkAs: null,
  },

  UNKNOWN: {
    persistence: { mode: 'none' },
    forwardTo: null,
    toPayload: () => ({}),
    linkAs: null,
  },
};
