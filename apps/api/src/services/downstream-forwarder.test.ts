/**
 * Downstream Forwarder Unit Tests
 */

import { describe, test, expect, vi } from 'vitest';
import { createHandlerFetch, createTestConfig, sentPayload, sentUrl } from '../test-helpers';
import { DownstreamForwarder } from './downstream-forwarder';

describe('DownstreamForwarder', () => {
  const config = createTestConfig();

  test('posts the payload as JSON and returns status and body', async () => {
    const fetchMock = createHandlerFetch({
      'http://research.test/query': { status: 200, body: { answer: 'RAG combines retrieval and generation' } },
    });
    const forwarder = new DownstreamForwarder({ handlers: config.handlers, fetch: fetchMock });

    const response = await forwarder.forward('research', { query: 'What is RAG?' });

    expect(response).toEqual({ status: 200, body: '{"answer":"RAG combines retrieval and generation"}' });
    expect(sentUrl(fetchMock)).toBe('http://research.test/query');
    expect(sentPayload(fetchMock)).toEqual({ query: 'What is RAG?' });

    const init = fetchMock.mock.calls[0]?.[1];
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json' });
  });

  test('returns non-2xx responses unchanged', async () => {
    const fetchMock = createHandlerFetch({
      'http://message.test/notify': { status: 503, body: 'busy' },
    });
    const forwarder = new DownstreamForwarder({ handlers: config.handlers, fetch: fetchMock });

    await expect(forwarder.forward('message', { text: 'hi' })).resolves.toEqual({ status: 503, body: 'busy' });
  });

  test('captures network errors as status 500', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed'));
    const forwarder = new DownstreamForwarder({ handlers: config.handlers, fetch: fetchMock });

    await expect(forwarder.forward('email', {})).resolves.toEqual({ status: 500, body: 'fetch failed' });
  });

  test('a hanging handler times out instead of blocking the request', async () => {
    const hanging = vi.fn<typeof fetch>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(init?.signal?.reason));
        })
    );
    const handlers = {
      ...config.handlers,
      research: { url: 'http://research.test/query', timeoutMs: 50 },
    };
    const forwarder = new DownstreamForwarder({ handlers, fetch: hanging });

    const started = Date.now();
    const response = await forwarder.forward('research', { query: 'slow' });

    expect(response).toEqual({ status: 500, body: 'Handler research timed out after 50ms' });
    expect(Date.now() - started).toBeLessThan(1000);
  });

  test('does not call unconfigured handlers', async () => {
    const fetchMock = createHandlerFetch({});
    const unconfigured = createTestConfig({ MESSAGE_HANDLER_URL: '' });
    const forwarder = new DownstreamForwarder({ handlers: unconfigured.handlers, fetch: fetchMock });

    await expect(forwarder.forward('message', {})).resolves.toEqual({
      status: 500,
      body: 'Handler message is not configured',
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
