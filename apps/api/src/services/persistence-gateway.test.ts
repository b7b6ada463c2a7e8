/**
 * Persistence Gateway Unit Tests
 */

import { describe, test, expect, vi, beforeEach } from 'vitest';
import { PersistenceError } from '../errors';
import { InMemoryTaskStore, newTaskRecord } from '../test-helpers';
import { PersistenceGateway } from './persistence-gateway';

describe('PersistenceGateway', () => {
  let store: InMemoryTaskStore;
  let gateway: PersistenceGateway;

  beforeEach(() => {
    store = new InMemoryTaskStore();
    gateway = new PersistenceGateway(store);
  });

  describe('create', () => {
    test('returns the stored record with its identifier', async () => {
      const created = await gateway.create(newTaskRecord());

      expect(created.id).toBe('task-1');
      expect(created.title).toBe('Call Aayush');
      expect(created.calendarLink).toBeNull();
      expect(store.records).toHaveLength(1);
    });

    test('surfaces store failures as PersistenceError', async () => {
      store.failCreate = true;

      const error = await gateway.create(newTaskRecord()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PersistenceError);
      if (error instanceof PersistenceError) {
        expect(error.code).toBe('PERSISTENCE_ERROR');
        expect(error.message).toBe('Failed to create task "Call Aayush": store rejected create');
      }
    });
  });

  describe('patch', () => {
    test('changes only the named fields', async () => {
      const created = await gateway.create(newTaskRecord({ purpose: 'Catch up' }));
      const before = { ...store.get(created.id) };

      const ok = await gateway.patch(created.id, { calendarLink: 'https://calendar.example.com/e/1' });

      expect(ok).toBe(true);
      expect(store.get(created.id)).toEqual({ ...before, calendarLink: 'https://calendar.example.com/e/1' });
    });

    test('swallows failures and reports false', async () => {
      const created = await gateway.create(newTaskRecord());
      store.failUpdate = true;

      await expect(gateway.patch(created.id, { status: 'Completed' })).resolves.toBe(false);
      expect(store.get(created.id)?.status).toBe('To Do');
    });
  });

  describe('query', () => {
    test('returns the first containment match, case-insensitively', async () => {
      await gateway.create(newTaskRecord({ title: 'Write weekly report' }));
      await gateway.create(newTaskRecord({ title: 'Review monthly report' }));

      const match = await gateway.query('REPORT');

      expect(match?.id).toBe('task-1');
    });

    test('asks the store for a single trimmed match', async () => {
      const spy = vi.spyOn(store, 'findTasksByTitle');

      await gateway.query('  report ');

      expect(spy).toHaveBeenCalledWith('report', 1);
    });

    test('returns null when nothing matches', async () => {
      await gateway.create(newTaskRecord({ title: 'Write weekly report' }));
      await expect(gateway.query('invoice')).resolves.toBeNull();
    });

    test('returns null for blank text without querying', async () => {
      const spy = vi.spyOn(store, 'findTasksByTitle');

      await expect(gateway.query('   ')).resolves.toBeNull();
      expect(spy).not.toHaveBeenCalled();
    });

    test('treats store failures as no match', async () => {
      vi.spyOn(store, 'findTasksByTitle').mockRejectedValue(new Error('connection reset'));
      await expect(gateway.query('report')).resolves.toBeNull();
    });
  });
});
