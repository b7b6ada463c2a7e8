/**
 * Reconciliation Linker
 *
 * Pulls a reference out of a handler response and attaches it to the task
 * record. Strictly best-effort: failures become warnings, never errors.
 */

import {
  isPlainObject,
  isSuccessStatus,
  type DownstreamResponse,
} from '../../../../packages/shared-types/src';
import type { PersistenceGateway } from './persistence-gateway';

export type LinkKind = 'calendar' | 'email';

export interface LinkResult {
  link?: string;
  warning?: string;
}

const CALENDAR_LINK_KEYS = ['htmlLink', 'html_link', 'eventLink', 'link'];
const EMAIL_ID_KEYS = ['id', 'messageId', 'message_id'];

function firstString(body: Record<string, unknown>, keys: string[]): string | undefined {
  for (const key of keys) {
    const value = body[key];
    if (typeof value === 'string' && value.trim()) {
      return value.trim();
    }
  }
  return undefined;
}

export class ReconciliationLinker {
  constructor(
    private persistence: PersistenceGateway,
    private config: { emailLinkBase: string }
  ) {}

  /**
   * Extract the reference for the given handler kind from a response body
   */
  extractLink(kind: LinkKind, body: string): string | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch {
      return null;
    }
    if (!isPlainObject(parsed)) {
      return null;
    }

    if (kind === 'calendar') {
      return firstString(parsed, CALENDAR_LINK_KEYS) ?? null;
    }

    const id = firstString(parsed, EMAIL_ID_KEYS);
    return id ? `${this.config.emailLinkBase}${id}` : null;
  }

  async reconcile(taskId: string, kind: LinkKind, response: DownstreamResponse): Promise<LinkResult> {
    if (!isSuccessStatus(response.status)) {
      return { warning: `Skipped ${kind} link: handler returned ${response.status}` };
    }

    const link = this.extractLink(kind, response.body);
    if (!link) {
      console.warn(`[Linker] No ${kind} reference in handler response for task ${taskId}`);
      return { warning: `No ${kind} reference in handler response` };
    }

    const patched = await this.persistence.patch(
      taskId,
      kind === 'calendar' ? { calendarLink: link } : { emailLink: link }
    );
    if (!patched) {
      return { link, warning: `Failed to attach ${kind} link to task ${taskId}` };
    }

    console.log(`[Linker] Attached ${kind} link to task ${taskId}`);
    return { link };
  }
}
