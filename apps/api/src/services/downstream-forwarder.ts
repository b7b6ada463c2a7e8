/**
 * Downstream Forwarder
 *
 * POSTs a payload to one handler service and captures whatever comes back.
 * Never throws: network failures and timeouts become status 500 with the
 * error text as body. No retries.
 */

import type { DownstreamResponse, HandlerKind } from '../../../../packages/shared-types/src';
import type { HandlerEndpoint } from '../config/env';
import { errorMessage } from '../errors';

function isAbortLike(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    (error.name === 'TimeoutError' || error.name === 'AbortError')
  );
}

export interface DownstreamForwarderConfig {
  handlers: Record<HandlerKind, HandlerEndpoint>;
  /** Injected for tests; defaults to the global fetch */
  fetch?: typeof fetch;
}

export class DownstreamForwarder {
  private fetchImpl: typeof fetch;

  constructor(private config: DownstreamForwarderConfig) {
    this.fetchImpl = config.fetch ?? fetch;
  }

  async forward(kind: HandlerKind, payload: unknown): Promise<DownstreamResponse> {
    const endpoint = this.config.handlers[kind];

    if (!endpoint.url) {
      console.warn(`[Forwarder] No URL configured for ${kind} handler`);
      return { status: 500, body: `Handler ${kind} is not configured` };
    }

    const fetchImpl = this.fetchImpl;
    const started = Date.now();
    try {
      const res = await fetchImpl(endpoint.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(endpoint.timeoutMs),
      });
      const body = await res.text();
      console.log(`[Forwarder] ${kind} handler responded ${res.status} in ${Date.now() - started}ms`);
      return { status: res.status, body };
    } catch (error) {
      const message = isAbortLike(error)
        ? `Handler ${kind} timed out after ${endpoint.timeoutMs}ms`
        : errorMessage(error);
      console.error(`[Forwarder] ${kind} handler failed after ${Date.now() - started}ms:`, message);
      return { status: 500, body: message };
    }
  }
}
