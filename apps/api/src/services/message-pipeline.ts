/**
 * Message Pipeline
 *
 * classify → sanitize → normalize → dispatch for one inbound message.
 * Classifier failures and unparseable output degrade to UNKNOWN without
 * side effects.
 */

import type { IntentRecord, RouteResult } from '../../../../packages/shared-types/src';
import { UpstreamUnavailableError } from '../errors';
import type { ClassifierGateway } from './classifier-gateway';
import type { DispatchRouter } from './dispatch-router';
import { normalizeIntent, unknownIntent } from './intent-normalizer';
import { sanitizeOutput } from './output-sanitizer';

export interface MessagePipelineConfig {
  classifier: ClassifierGateway;
  router: DispatchRouter;
  timeZone: string;
  agentSource: string;
  fallbackEmail: string;
}

export class MessagePipeline {
  constructor(private config: MessagePipelineConfig) {}

  /**
   * Resolve a message to an intent record. An unavailable classifier is
   * reported alongside the UNKNOWN intent it degrades to.
   */
  async resolve(message: string, now: Date): Promise<{ intent: IntentRecord; error?: UpstreamUnavailableError }> {
    let raw: string;
    try {
      raw = await this.config.classifier.classify(message, now);
    } catch (error) {
      if (error instanceof UpstreamUnavailableError) {
        return { intent: unknownIntent(message, '', error.message), error };
      }
      throw error;
    }

    const sanitized = sanitizeOutput(raw);
    if (!sanitized.ok) {
      console.warn('[Pipeline] Malformed classifier output:', raw.slice(0, 200));
      return { intent: unknownIntent(message, sanitized.raw, sanitized.error.message) };
    }

    const intent = normalizeIntent(sanitized.value, {
      message,
      now,
      raw,
      timeZone: this.config.timeZone,
      agentSource: this.config.agentSource,
      fallbackEmail: this.config.fallbackEmail,
    });
    console.log(`[Pipeline] Classified as ${intent.intent}`);
    return { intent };
  }

  async route(message: string, now: Date = new Date()): Promise<RouteResult> {
    const { intent, error } = await this.resolve(message, now);
    const result = await this.config.router.dispatch(intent, now);
    if (error) {
      result.error = error.toJSON();
    }
    return result;
  }
}
