/**
 * Persistence Gateway
 *
 * Creates, patches and looks up task records in the external store.
 * Only create failures are surfaced; patches and lookups are best-effort.
 */

import type { NewTaskRecord, TaskPatch, TaskRecord } from '../../../../packages/shared-types/src';
import { PersistenceError, errorMessage } from '../errors';

/**
 * Store operations the gateway relies on (implemented over drizzle in task-store.ts)
 */
export interface TaskStoreConnection {
  createTask(data: NewTaskRecord): Promise<TaskRecord>;
  updateTask(id: string, updates: TaskPatch): Promise<void>;
  /** Records whose title contains the text, case-insensitively, in store order */
  findTasksByTitle(text: string, limit: number): Promise<TaskRecord[]>;
}

export class PersistenceGateway {
  constructor(private db: TaskStoreConnection) {}

  /**
   * Create a task record.
   *
   * @throws PersistenceError when the store rejects the create
   */
  async create(record: NewTaskRecord): Promise<TaskRecord> {
    try {
      const created = await this.db.createTask(record);
      console.log(`[Persistence] Created task ${created.id}: "${created.title}"`);
      return created;
    } catch (error) {
      console.error('[Persistence] Create failed:', errorMessage(error));
      throw new PersistenceError(`Failed to create task "${record.title}": ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Apply a partial update. Failures are logged and reported as false.
   */
  async patch(id: string, fields: TaskPatch): Promise<boolean> {
    try {
      await this.db.updateTask(id, fields);
      console.log(`[Persistence] Patched task ${id}:`, Object.keys(fields).join(', '));
      return true;
    } catch (error) {
      console.error(`[Persistence] Patch of task ${id} failed:`, errorMessage(error));
      return false;
    }
  }

  /**
   * First record whose title contains the text. When several match, the
   * first one returned by the store wins; there is no further disambiguation.
   */
  async query(filterText: string): Promise<TaskRecord | null> {
    const text = filterText.trim();
    if (!text) {
      return null;
    }

    try {
      const [match] = await this.db.findTasksByTitle(text, 1);
      return match ?? null;
    } catch (error) {
      console.error(`[Persistence] Query for "${text}" failed:`, errorMessage(error));
      return null;
    }
  }
}
