/**
 * Claude Client Unit Tests
 *
 * The SDK's query() is replaced by a fake message stream.
 */

import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import { ClaudeAgentClient } from './claude-client';

interface FakeMessage {
  type: string;
  subtype?: string;
  result?: string;
  session_id: string;
}

interface QueryParams {
  prompt: string;
  options?: {
    abortController?: AbortController;
    systemPrompt?: string;
    allowedTools?: string[];
    maxTurns?: number;
    model?: string;
    env?: Record<string, string | undefined>;
  };
}

const queryMock = vi.hoisted(() => vi.fn<(params: QueryParams) => AsyncIterable<FakeMessage>>());

vi.mock('@anthropic-ai/claude-agent-sdk', () => ({ query: queryMock }));

async function* stream(messages: FakeMessage[]): AsyncGenerator<FakeMessage> {
  for (const message of messages) {
    yield message;
  }
}

describe('ClaudeAgentClient', () => {
  beforeEach(() => {
    queryMock.mockReset();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test('returns the final result text and session id', async () => {
    queryMock.mockReturnValue(
      stream([
        { type: 'system', session_id: 'session-1' },
        { type: 'assistant', session_id: 'session-1' },
        { type: 'result', subtype: 'success', result: '{"intent": "TASK"}', session_id: 'session-1' },
      ])
    );
    const client = new ClaudeAgentClient();

    await expect(client.run({ prompt: 'Call Aayush', systemPrompt: 'Classify' })).resolves.toEqual({
      response: '{"intent": "TASK"}',
      sessionId: 'session-1',
    });
  });

  test('runs a single tool-less turn with the configured model and key', async () => {
    queryMock.mockReturnValue(stream([{ type: 'result', subtype: 'success', result: '{}', session_id: 's' }]));
    const client = new ClaudeAgentClient({ apiKey: 'test-key', model: 'test-model' });

    await client.run({ prompt: 'hello', systemPrompt: 'Classify' });

    const params = queryMock.mock.calls[0]?.[0];
    expect(params?.prompt).toBe('hello');
    expect(params?.options).toMatchObject({
      systemPrompt: 'Classify',
      allowedTools: [],
      maxTurns: 1,
      model: 'test-model',
    });
    expect(params?.options?.env?.ANTHROPIC_API_KEY).toBe('test-key');
  });

  test('rejects when the query ends without success', async () => {
    queryMock.mockReturnValue(stream([{ type: 'result', subtype: 'error_max_turns', session_id: 's' }]));
    const client = new ClaudeAgentClient();

    await expect(client.run({ prompt: 'hello' })).rejects.toThrow('Claude query ended with error_max_turns');
  });

  test('aborts a query that never finishes and clears its timer', async () => {
    vi.useFakeTimers();
    queryMock.mockImplementation(async function* (params) {
      await new Promise<void>((_resolve, reject) => {
        params.options?.abortController?.signal.addEventListener('abort', () =>
          reject(new Error('Operation aborted'))
        );
      });
      yield { type: 'result', subtype: 'success', result: '{}', session_id: 's' };
    });
    const client = new ClaudeAgentClient({ defaultTimeoutMs: 20 });

    const outcome = client.run({ prompt: 'hello' }).catch((e: unknown) => e);
    await vi.advanceTimersByTimeAsync(20);
    const error = await outcome;

    expect(error).toBeInstanceOf(Error);
    if (error instanceof Error) {
      expect(error.message).toBe('Claude query timed out after 20ms');
    }
    expect(queryMock.mock.calls[0]?.[0].options?.abortController?.signal.aborted).toBe(true);
    expect(vi.getTimerCount()).toBe(0);
  });

  test('the per-call timeout overrides the default', async () => {
    vi.useFakeTimers();
    queryMock.mockImplementation(async function* (params) {
      await new Promise<void>((_resolve, reject) => {
        params.options?.abortController?.signal.addEventListener('abort', () => reject(new Error('aborted')));
      });
      yield { type: 'result', session_id: 's' };
    });
    const client = new ClaudeAgentClient({ defaultTimeoutMs: 10_000 });

    const outcome = client.run({ prompt: 'hello', timeout: 50 }).catch((e: unknown) => e);
    await vi.advanceTimersByTimeAsync(50);

    await expect(outcome).resolves.toMatchObject({ message: 'Claude query timed out after 50ms' });
  });
});
