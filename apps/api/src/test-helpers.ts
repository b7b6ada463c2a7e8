/**
 * Shared test fixtures: an in-memory task store and a fake handler fetch.
 */

import { vi } from 'vitest';
import type {
  NewTaskRecord,
  TaskPatch,
  TaskRecord,
} from '../../../packages/shared-types/src';
import { loadConfig, type AppConfig } from './config/env';
import type { TaskStoreConnection } from './services/persistence-gateway';

export const TEST_NOW = new Date('2025-11-12T10:00:00+05:30');

export const TEST_ENV: Record<string, string> = {
  TIMEZONE: 'Asia/Kolkata',
  AGENT_SOURCE: 'Parent Agent',
  FALLBACK_EMAIL: 'me@example.com',
  EMAIL_LINK_BASE: 'https://mail.example.com/inbox/',
  CALENDAR_HANDLER_URL: 'http://calendar.test/events',
  EMAIL_HANDLER_URL: 'http://email.test/drafts',
  RESEARCH_HANDLER_URL: 'http://research.test/query',
  MESSAGE_HANDLER_URL: 'http://message.test/notify',
  EXPERIENCE_HANDLER_URL: 'http://xp.test/award',
};

export function createTestConfig(overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({ ...TEST_ENV, ...overrides });
}

/**
 * Task store kept in an array; ids are task-1, task-2, ...
 */
export class InMemoryTaskStore implements TaskStoreConnection {
  records: TaskRecord[] = [];
  failCreate = false;
  failUpdate = false;
  private nextId = 1;

  async createTask(data: NewTaskRecord): Promise<TaskRecord> {
    if (this.failCreate) {
      throw new Error('store rejected create');
    }
    const record: TaskRecord = {
      ...data,
      id: `task-${this.nextId++}`,
      calendarLink: null,
      emailLink: null,
    };
    this.records.push(record);
    return { ...record };
  }

  async updateTask(id: string, updates: TaskPatch): Promise<void> {
    if (this.failUpdate) {
      throw new Error('store rejected update');
    }
    const record = this.records.find((r) => r.id === id);
    if (!record) {
      throw new Error(`No task ${id}`);
    }
    Object.assign(record, updates);
  }

  async findTasksByTitle(text: string, limit: number): Promise<TaskRecord[]> {
    const needle = text.toLowerCase();
    return this.records
      .filter((r) => r.title.toLowerCase().includes(needle))
      .slice(0, limit)
      .map((r) => ({ ...r }));
  }

  get(id: string): TaskRecord | undefined {
    return this.records.find((r) => r.id === id);
  }
}

export function newTaskRecord(overrides: Partial<NewTaskRecord> = {}): NewTaskRecord {
  return {
    title: 'Call Aayush',
    result: '',
    purpose: '',
    actionPlan: [],
    role: 'Producer',
    status: 'To Do',
    dueDate: null,
    xp: 10,
    source: 'Parent Agent',
    context: 'Remind me to call Aayush at 9pm',
    createdAt: TEST_NOW,
    ...overrides,
  };
}

export interface HandlerReply {
  status?: number;
  body?: unknown;
}

function requestUrl(input: string | URL | Request): string {
  if (typeof input === 'string') {
    return input;
  }
  return input instanceof URL ? input.toString() : input.url;
}

/**
 * Fake fetch answering each handler URL with a fixed reply.
 * Unknown URLs get 404.
 */
export function createHandlerFetch(replies: Record<string, HandlerReply>) {
  return vi.fn<typeof fetch>(async (input) => {
    const reply = replies[requestUrl(input)];
    if (!reply) {
      return new Response('no handler', { status: 404 });
    }
    const body = typeof reply.body === 'string' ? reply.body : JSON.stringify(reply.body ?? {});
    return new Response(body, { status: reply.status ?? 200 });
  });
}

/** JSON body of the n-th call made through a fake fetch */
export function sentPayload(fetchMock: ReturnType<typeof createHandlerFetch>, call = 0): unknown {
  const init = fetchMock.mock.calls[call]?.[1];
  return typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
}

export function sentUrl(fetchMock: ReturnType<typeof createHandlerFetch>, call = 0): string | undefined {
  const input = fetchMock.mock.calls[call]?.[0];
  return input === undefined ? undefined : requestUrl(input);
}
