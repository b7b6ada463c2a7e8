/**
 * Claude Agent SDK Client
 *
 * Wraps the @anthropic-ai/claude-agent-sdk for single-turn, tool-less
 * completions. The classifier only needs text in and text out.
 *
 * NOTE: The Agent SDK spawns the CLI bundled with the package as
 * a subprocess.
 */

import { query } from '@anthropic-ai/claude-agent-sdk';

/**
 * Configuration for the Claude Agent Client
 */
export interface ClaudeAgentClientConfig {
  apiKey?: string;
  /** Model alias or id; the SDK default is used when unset */
  model?: string;
  /** Default timeout in milliseconds */
  defaultTimeoutMs?: number;
}

/**
 * Options for running a query
 */
export interface ClaudeQueryOptions {
  prompt: string;
  systemPrompt?: string;
  timeout?: number;
}

/**
 * Result from an aggregated run
 */
export interface ClaudeRunResult {
  response: string;
  sessionId: string;
}

/**
 * Anything that can answer a prompt with text
 */
export interface ClaudeClient {
  run(options: ClaudeQueryOptions): Promise<ClaudeRunResult>;
}

/**
 * Claude Agent SDK Client
 */
export class ClaudeAgentClient implements ClaudeClient {
  private config: { apiKey?: string; model?: string; defaultTimeoutMs: number };

  constructor(config: ClaudeAgentClientConfig = {}) {
    this.config = {
      apiKey: config.apiKey,
      model: config.model,
      defaultTimeoutMs: config.defaultTimeoutMs ?? 15000,
    };
  }

  /**
   * Run a query and return the final result text.
   * Aborts the underlying CLI process once the timeout elapses.
   */
  async run(options: ClaudeQueryOptions): Promise<ClaudeRunResult> {
    const timeoutMs = options.timeout ?? this.config.defaultTimeoutMs;
    const abortController = new AbortController();
    const timer = setTimeout(() => abortController.abort(), timeoutMs);

    let responseText = '';
    let sessionId = '';

    console.log('[ClaudeAgentClient] run() called with prompt:', options.prompt.slice(0, 100));

    try {
      for await (const message of query({
        prompt: options.prompt,
        options: {
          abortController,
          systemPrompt: options.systemPrompt,
          allowedTools: [],
          maxTurns: 1,
          ...(this.config.model && { model: this.config.model }),
          ...(this.config.apiKey && {
            env: { ...process.env, ANTHROPIC_API_KEY: this.config.apiKey },
          }),
        },
      })) {
        sessionId = message.session_id || sessionId;

        if (message.type === 'result') {
          if (message.subtype !== 'success') {
            throw new Error(`Claude query ended with ${message.subtype}`);
          }
          responseText = message.result;
        }
      }
    } catch (error) {
      if (abortController.signal.aborted) {
        throw new Error(`Claude query timed out after ${timeoutMs}ms`, { cause: error });
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }

    console.log('[ClaudeAgentClient] run() completed, response length:', responseText.length);
    return {
      response: responseText,
      sessionId,
    };
  }
}

/**
 * Mock Claude client for development without API key.
 * Classifies every message as UNKNOWN.
 */
export class MockClaudeClient implements ClaudeClient {
  async run(options: ClaudeQueryOptions): Promise<ClaudeRunResult> {
    console.log('[MockClaudeClient] run() called');
    console.log('[MockClaudeClient] Prompt:', options.prompt.slice(0, 100));

    return {
      response: JSON.stringify({
        intent: 'UNKNOWN',
        data: options.prompt,
        note: 'Mock classifier. Set ANTHROPIC_API_KEY to use the Claude Agent SDK.',
      }),
      sessionId: 'mock-session-' + Date.now(),
    };
  }
}

/**
 * Create a Claude client based on configuration
 */
export function createClaudeClient(config: ClaudeAgentClientConfig): ClaudeClient {
  if (!config.apiKey) {
    console.warn('[ClaudeClient] ANTHROPIC_API_KEY not set, using mock client.');
    return new MockClaudeClient();
  }

  console.log('[ClaudeClient] Using Claude Agent SDK');
  return new ClaudeAgentClient(config);
}
