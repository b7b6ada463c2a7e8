/**
 * Task store over the drizzle tasks table
 */

import { eq, ilike } from 'drizzle-orm';
import { tasks, type Database } from '../../../../packages/db/src';
import type { TaskStoreConnection } from './persistence-gateway';

export function escapeLikePattern(text: string): string {
  return text.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

export function createTaskStore(db: Database): TaskStoreConnection {
  return {
    async createTask(data) {
      const [task] = await db.insert(tasks).values(data).returning();
      if (!task) {
        throw new Error('Insert returned no row');
      }
      return task;
    },
    async updateTask(id, updates) {
      await db.update(tasks).set(updates).where(eq(tasks.id, id));
    },
    async findTasksByTitle(text, limit) {
      return db
        .select()
        .from(tasks)
        .where(ilike(tasks.title, `%${escapeLikePattern(text)}%`))
        .limit(limit);
    },
  };
}

