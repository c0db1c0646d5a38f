/**
 * BNPL Credit Protocol - External Ledger Event Mirror
 *
 * CANONICAL SCHEMA v1.0.0
 * - Uses BNPL_<EVENT> event naming
 * - Publishes to {baseUrl}/api/v1/events/canonical
 * - Includes idempotency_key for duplicate prevention
 */

import { createHash } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import { ProtocolEvent, serializeEvent } from '../../shared/types';
import { EventMirror } from './event-mirror';

const SCHEMA_VERSION = '1.0.0';
const PRODUCER = 'bnpl-credit-protocol';
const PRODUCER_VERSION = '1.0.0';

export interface CanonicalEvent {
  schema_version: string;
  event_type: string;
  occurred_at: string;
  idempotency_key: string;
  producer: string;
  producer_version: string;
  subject: { user: string; loan_id: number };
  payload: Record<string, string | number | boolean>;
  canonical_hash_hex: string;
}

function hashPayload(payload: Record<string, unknown>): string {
  const json = JSON.stringify(payload, Object.keys(payload).sort());
  return createHash('sha256').update(json).digest('hex');
}

export function toCanonicalEvent(event: ProtocolEvent): CanonicalEvent {
  const payload = serializeEvent(event);

  return {
    schema_version: SCHEMA_VERSION,
    event_type: `BNPL_${event.type}`,
    occurred_at: new Date(event.time * 1000).toISOString(),
    idempotency_key: `bnpl_${uuidv4()}`,
    producer: PRODUCER,
    producer_version: PRODUCER_VERSION,
    subject: { user: event.user, loan_id: event.loanId },
    payload,
    canonical_hash_hex: hashPayload(payload),
  };
}

export class HttpEventMirror implements EventMirror {
  readonly name = 'HTTP_LEDGER';

  constructor(private readonly baseUrl: string) {}

  /**
   * POST one event. Failures are logged, never retried.
   */
  async record(event: ProtocolEvent): Promise<void> {
    const canonical = toCanonicalEvent(event);

    try {
      const response = await fetch(`${this.baseUrl}/api/v1/events/canonical`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(canonical),
      });

      if (!response.ok) {
        const errorText = await response.text();
        console.warn(`[EventMirror] Write failed: ${response.status} ${errorText}`);
        return;
      }

      console.log(`[EventMirror] ${canonical.event_type} written for loan ${event.loanId}`);
    } catch (error) {
      console.error('[EventMirror] Write error:', error);
    }
  }
}
