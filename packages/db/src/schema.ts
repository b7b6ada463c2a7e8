import {
  pgTable,
  text,
  timestamp,
  jsonb,
  uuid,
  integer,
  index,
  pgEnum,
} from 'drizzle-orm/pg-core';
import { TASK_ROLES, TASK_STATUSES } from '../../shared-types/src';

// Task role enum
export const taskRoleEnum = pgEnum('task_role', TASK_ROLES);

// Task status enum
export const taskStatusEnum = pgEnum('task_status', TASK_STATUSES);

// Tasks table
export const tasks = pgTable(
  'tasks',
  {
    id: uuid('id').primaryKey().defaultRandom(),

    // Task identity
    title: text('title').notNull(),
    result: text('result').notNull().default(''),
    purpose: text('purpose').notNull().default(''),
    actionPlan: jsonb('action_plan').$type<string[]>().notNull().default([]),

    // Classification
    role: taskRoleEnum('role').notNull().default('Producer'),
    status: taskStatusEnum('status').notNull().default('To Do'),
    dueDate: timestamp('due_date', { withTimezone: true }),
    xp: integer('xp').notNull().default(0),

    // Provenance
    source: text('source').notNull(),
    context: text('context').notNull(),

    // Links attached after creation by downstream handlers
    calendarLink: text('calendar_link'),
    emailLink: text('email_link'),

    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    // Index for completion lookups by title
    index('idx_tasks_title').on(table.title),
    index('idx_tasks_status').on(table.status),
  ]
);
