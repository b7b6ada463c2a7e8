/**
 * Reconciliation Linker Unit Tests
 */

import { describe, test, expect, beforeEach } from 'vitest';
import { InMemoryTaskStore, newTaskRecord } from '../test-helpers';
import { PersistenceGateway } from './persistence-gateway';
import { ReconciliationLinker } from './reconciliation-linker';

describe('ReconciliationLinker', () => {
  let store: InMemoryTaskStore;
  let linker: ReconciliationLinker;

  beforeEach(() => {
    store = new InMemoryTaskStore();
    linker = new ReconciliationLinker(new PersistenceGateway(store), {
      emailLinkBase: 'https://mail.example.com/inbox/',
    });
  });

  describe('extractLink', () => {
    test('reads the calendar event link', () => {
      expect(linker.extractLink('calendar', '{"htmlLink":"https://calendar.example.com/e/1"}')).toBe(
        'https://calendar.example.com/e/1'
      );
      expect(linker.extractLink('calendar', '{"event_id":"1","link":"https://calendar.example.com/e/2"}')).toBe(
        'https://calendar.example.com/e/2'
      );
    });

    test('builds the email link from the draft id', () => {
      expect(linker.extractLink('email', '{"id":"abc123"}')).toBe('https://mail.example.com/inbox/abc123');
      expect(linker.extractLink('email', '{"message_id":"xyz"}')).toBe('https://mail.example.com/inbox/xyz');
    });

    test('returns null for bodies without a reference', () => {
      expect(linker.extractLink('calendar', 'created')).toBeNull();
      expect(linker.extractLink('calendar', '["https://calendar.example.com/e/1"]')).toBeNull();
      expect(linker.extractLink('email', '{"id":""}')).toBeNull();
    });
  });

  describe('reconcile', () => {
    test('attaches the link and leaves every other field unchanged', async () => {
      const created = await store.createTask(newTaskRecord({ purpose: 'Catch up', xp: 25 }));
      const before = { ...store.get(created.id) };

      const result = await linker.reconcile(created.id, 'calendar', {
        status: 200,
        body: '{"htmlLink":"https://calendar.example.com/e/1"}',
      });

      expect(result).toEqual({ link: 'https://calendar.example.com/e/1' });
      expect(store.get(created.id)).toEqual({ ...before, calendarLink: 'https://calendar.example.com/e/1' });
    });

    test('writes email links to the email field', async () => {
      const created = await store.createTask(newTaskRecord({ title: 'Email to boss@example.com' }));

      const result = await linker.reconcile(created.id, 'email', { status: 201, body: '{"id":"abc123"}' });

      expect(result).toEqual({ link: 'https://mail.example.com/inbox/abc123' });
      expect(store.get(created.id)?.emailLink).toBe('https://mail.example.com/inbox/abc123');
      expect(store.get(created.id)?.calendarLink).toBeNull();
    });

    test('skips non-2xx responses', async () => {
      const created = await store.createTask(newTaskRecord());

      const result = await linker.reconcile(created.id, 'calendar', {
        status: 500,
        body: '{"htmlLink":"https://calendar.example.com/e/1"}',
      });

      expect(result).toEqual({ warning: 'Skipped calendar link: handler returned 500' });
      expect(store.get(created.id)?.calendarLink).toBeNull();
    });

    test('warns when the response has no reference', async () => {
      const created = await store.createTask(newTaskRecord());

      const result = await linker.reconcile(created.id, 'calendar', { status: 200, body: '{}' });

      expect(result).toEqual({ warning: 'No calendar reference in handler response' });
    });

    test('reports a failed patch as a warning', async () => {
      const created = await store.createTask(newTaskRecord());
      store.failUpdate = true;

      const result = await linker.reconcile(created.id, 'email', { status: 200, body: '{"id":"abc123"}' });

      expect(result).toEqual({
        link: 'https://mail.example.com/inbox/abc123',
        warning: 'Failed to attach email link to task task-1',
      });
    });
  });
});
