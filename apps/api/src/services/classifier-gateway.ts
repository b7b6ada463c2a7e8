/**
 * Classifier Gateway
 *
 * Sends one message and the instruction template to the language model and
 * returns its raw text. No retries.
 */

import { buildClassifierPrompt } from '../config/classifier-prompt';
import { UpstreamUnavailableError, errorMessage } from '../errors';
import type { ClaudeClient } from './claude-client';

export interface ClassifierGatewayConfig {
  client: ClaudeClient;
  timeZone: string;
  timeoutMs: number;
}

export class ClassifierGateway {
  constructor(private config: ClassifierGatewayConfig) {}

  /**
   * Classify a message.
   *
   * @throws UpstreamUnavailableError when the model cannot be reached or times out
   */
  async classify(message: string, now: Date): Promise<string> {
    const systemPrompt = buildClassifierPrompt(now, this.config.timeZone);

    try {
      const result = await this.config.client.run({
        prompt: message,
        systemPrompt,
        timeout: this.config.timeoutMs,
      });
      console.log('[Classifier] Raw reply:', result.response.slice(0, 200));
      return result.response;
    } catch (error) {
      console.error('[Classifier] Classification failed:', errorMessage(error));
      throw new UpstreamUnavailableError(`Classifier unavailable: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
