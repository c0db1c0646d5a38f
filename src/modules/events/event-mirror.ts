/**
 * BNPL Credit Protocol - Event Mirror Port
 * Fire-and-forget log of committed protocol activity.
 *
 * Nothing the mirror returns flows back into core state, and a failing
 * mirror never aborts an operation.
 */

import { ProtocolEvent, serializeEvent } from '../../shared/types';

export interface EventMirror {
  readonly name: string;
  record(event: ProtocolEvent): Promise<void>;
}

/**
 * Keeps events in process (tests, dev mode)
 */
export class InMemoryEventMirror implements EventMirror {
  readonly name = 'IN_MEMORY';
  private readonly events: ProtocolEvent[] = [];

  async record(event: ProtocolEvent): Promise<void> {
    this.events.push(event);
  }

  getEvents(): ProtocolEvent[] {
    return [...this.events];
  }

  ofType<T extends ProtocolEvent['type']>(type: T): Array<Extract<ProtocolEvent, { type: T }>> {
    return this.events.filter((e): e is Extract<ProtocolEvent, { type: T }> => e.type === type);
  }

  clear(): void {
    this.events.length = 0;
  }
}

/**
 * Writes events to stdout
 */
export class ConsoleEventMirror implements EventMirror {
  readonly name = 'CONSOLE';

  async record(event: ProtocolEvent): Promise<void> {
    console.log(`[EventMirror] ${event.type} ${JSON.stringify(serializeEvent(event))}`);
  }
}
