/**
 * Dispatch Router
 *
 * Runs the action sequence the dispatch table declares for one intent:
 * persist → forward → reconcile. Holds no state between requests.
 *
 * Only a failed create changes the outcome. Everything after the record
 * exists degrades into warnings.
 */

import {
  isSuccessStatus,
  type IntentRecord,
  type IntentTag,
  type RouteResult,
  type TaskRecord,
} from '../../../../packages/shared-types/src';
import {
  DISPATCH_TABLE,
  type DispatchRule,
  type DispatchTable,
  type IntentMap,
} from '../config/dispatch-table';
import { NotFoundError, PersistenceError } from '../errors';
import type { DownstreamForwarder } from './downstream-forwarder';
import type { PersistenceGateway } from './persistence-gateway';
import type { ReconciliationLinker } from './reconciliation-linker';

export interface DispatchRouterConfig {
  persistence: PersistenceGateway;
  forwarder: DownstreamForwarder;
  linker: ReconciliationLinker;
  timeZone: string;
  table?: DispatchTable;
}

export class DispatchRouter {
  private table: DispatchTable;

  constructor(private config: DispatchRouterConfig) {
    this.table = config.table ?? DISPATCH_TABLE;
  }

  async dispatch(intent: IntentRecord, now: Date): Promise<RouteResult> {
    console.log(`[Router] Dispatching ${intent.intent}`);

    if (intent.intent === 'UNKNOWN') {
      return {
        intent: 'UNKNOWN',
        outcome: 'unknown',
        raw: intent.raw,
        reason: intent.reason,
        warnings: [],
      };
    }

    return this.run(intent.intent, intent, now);
  }

  private async run<K extends IntentTag>(tag: K, intent: IntentMap[K], now: Date): Promise<RouteResult> {
    const rule: DispatchRule<IntentMap[K]> = this.table[tag];
    const warnings: string[] = [];
    let record: TaskRecord | null = null;

    // 1. Persist
    const persistence = rule.persistence;
    if (persistence.mode === 'create') {
      try {
        record = await this.config.persistence.create(persistence.toRecord(intent, now));
      } catch (error) {
        if (error instanceof PersistenceError) {
          return { intent: tag, outcome: 'persistence_error', error: error.toJSON(), warnings };
        }
        throw error;
      }
    } else if (persistence.mode === 'complete') {
      const title = persistence.lookupTitle(intent);
      const match = await this.config.persistence.query(title);
      if (!match) {
        console.log(`[Router] No task matching "${title}"`);
        const notFound = new NotFoundError(`No task found matching "${title}"`);
        return { intent: tag, outcome: 'not_found', error: notFound.toJSON(), warnings };
      }

      const patched = await this.config.persistence.patch(match.id, { status: 'Completed' });
      if (!patched) {
        warnings.push(`Failed to mark task ${match.id} as Completed`);
      }
      // Report the status the store actually holds
      record = patched ? { ...match, status: 'Completed' } : match;
    }

    const result: RouteResult = {
      intent: tag,
      outcome: persistence.mode === 'complete' ? 'completed' : record ? 'created' : 'forwarded',
      warnings,
    };
    if (record) {
      result.record = { id: record.id, title: record.title, status: record.status };
    }

    // 2. Forward
    if (!rule.forwardTo) {
      return result;
    }

    const payload = rule.toPayload(intent, { timeZone: this.config.timeZone, record });
    const response = await this.config.forwarder.forward(rule.forwardTo, payload);
    result.downstream = { handler: rule.forwardTo, ...response };

    if (!isSuccessStatus(response.status)) {
      if (record) {
        warnings.push(`${rule.forwardTo} handler returned ${response.status}`);
      } else {
        result.outcome = 'downstream_error';
      }
      return result;
    }

    // 3. Reconcile
    if (rule.linkAs && record) {
      const linked = await this.config.linker.reconcile(record.id, rule.linkAs, response);
      if (linked.link) {
        result.link = linked.link;
      }
      if (linked.warning) {
        warnings.push(linked.warning);
      }
    }

    return result;
  }
}
