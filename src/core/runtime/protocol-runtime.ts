/**
 * BNPL Credit Protocol - Runtime
 * THE ENVELOPE: atomic, strictly serial execution of protocol operations.
 *
 * EXECUTION MODEL:
 * 1. SERIAL: top-level operations queue on one mutex and run to completion.
 * 2. ATOMIC: every store write is journaled; a failing operation is replayed
 *    backwards across all ledgers before the error leaves the runtime.
 * 3. SAVEPOINTS: a nested execute() (a component calling another component)
 *    opens its own frame, so a caught failure undoes only that call.
 * 4. EVENTS: buffered per frame, published only after the top-level commit.
 */

import { AsyncLocalStorage } from 'async_hooks';
import { v4 as uuidv4 } from 'uuid';
import { ProtocolEvent } from '../../shared/types';
import { describeError } from '../../shared/errors';
import { EventMirror } from '../../modules/events/event-mirror';
import { Mutex } from './mutex';
import { Journal } from './tracked-store';

/**
 * Minimal query surface of a database session (pg's Pool and PoolClient satisfy it).
 * Rows are untyped until a repository decodes them.
 */
export interface PersistenceSession {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

/**
 * Runs a unit of work inside one database transaction
 */
export interface StatePersistence {
  transaction(work: (session: PersistenceSession) => Promise<void>): Promise<void>;
}

/**
 * Backing store: reads outside any transaction, writes inside one
 */
export interface StateStore extends PersistenceSession, StatePersistence {}

/**
 * A component whose dirty state is written on commit
 */
export interface PersistentParticipant {
  readonly name: string;
  flush(session: PersistenceSession): Promise<void>;
}

interface Frame {
  readonly undo: Array<() => void>;
  readonly events: ProtocolEvent[];
}

interface OperationContext {
  readonly id: string;
  readonly label: string;
  readonly frames: Frame[];
  closed: boolean;
}

export interface ProtocolRuntimeOptions {
  eventMirror: EventMirror;
  persistence?: StatePersistence;
}

export class ProtocolRuntime implements Journal {
  private readonly mutex = new Mutex();
  private readonly context = new AsyncLocalStorage<OperationContext>();
  private readonly participants: PersistentParticipant[] = [];
  private eventMirror: EventMirror;
  private readonly persistence?: StatePersistence;

  constructor(options: ProtocolRuntimeOptions) {
    this.eventMirror = options.eventMirror;
    this.persistence = options.persistence;
  }

  /**
   * Run a protocol operation.
   * Top-level: serialized and atomic. Nested: savepoint inside the caller's operation.
   */
  async execute<T>(label: string, work: () => Promise<T>): Promise<T> {
    const current = this.context.getStore();
    // A callback deferred past its operation's commit still carries that context
    if (current && !current.closed && current.frames.length > 0) {
      return this.runSavepoint(current, work);
    }

    return this.mutex.runExclusive(() => {
      const operation: OperationContext = { id: uuidv4(), label, frames: [], closed: false };
      return this.context.run(operation, () => this.runOperation(operation, work));
    });
  }

  /**
   * Run a best-effort step: a failure is undone, logged and swallowed.
   * Returns true when the step succeeded.
   */
  async attempt(label: string, work: () => Promise<void>): Promise<boolean> {
    try {
      await this.execute(label, work);
      return true;
    } catch (error) {
      console.warn(`[Runtime] Best-effort step "${label}" failed: ${describeError(error)}`);
      return false;
    }
  }

  /**
   * Journal hook used by tracked stores
   */
  record(undo: () => void): void {
    const frame = this.currentFrame();
    if (frame) {
      frame.undo.push(undo);
    }
  }

  /**
   * Queue an event for publication after commit
   */
  emit(event: ProtocolEvent): void {
    const frame = this.currentFrame();
    if (frame) {
      frame.events.push(event);
    } else {
      this.publish([event]);
    }
  }

  register(participant: PersistentParticipant): void {
    this.participants.push(participant);
  }

  setEventMirror(mirror: EventMirror): void {
    this.eventMirror = mirror;
  }

  isInOperation(): boolean {
    const operation = this.context.getStore();
    return operation !== undefined && !operation.closed;
  }

  // ============================================
  // PRIVATE
  // ============================================

  private async runOperation<T>(operation: OperationContext, work: () => Promise<T>): Promise<T> {
    const frame: Frame = { undo: [], events: [] };
    operation.frames.push(frame);

    try {
      const result = await work();
      await this.persist();
      operation.frames.pop();
      this.publish(frame.events);
      return result;
    } catch (error) {
      this.rollback(frame);
      operation.frames.pop();
      console.error(`[Runtime] Operation ${operation.label} (${operation.id}) rolled back: ${describeError(error)}`);
      throw error;
    } finally {
      operation.closed = true;
    }
  }

  private async runSavepoint<T>(operation: OperationContext, work: () => Promise<T>): Promise<T> {
    const frame: Frame = { undo: [], events: [] };
    operation.frames.push(frame);

    try {
      const result = await work();
      operation.frames.pop();
      const parent = operation.frames[operation.frames.length - 1];
      if (parent) {
        parent.undo.push(...frame.undo);
        parent.events.push(...frame.events);
      }
      return result;
    } catch (error) {
      this.rollback(frame);
      operation.frames.pop();
      throw error;
    }
  }

  private rollback(frame: Frame): void {
    for (let i = frame.undo.length - 1; i >= 0; i--) {
      frame.undo[i]();
    }
    frame.undo.length = 0;
    frame.events.length = 0;
  }

  private async persist(): Promise<void> {
    if (!this.persistence || this.participants.length === 0) return;

    await this.persistence.transaction(async (session) => {
      for (const participant of this.participants) {
        await participant.flush(session);
      }
    });
  }

  private publish(events: ProtocolEvent[]): void {
    for (const event of events) {
      this.eventMirror.record(event).catch((error: unknown) => {
        console.warn(`[Runtime] Event mirror ${this.eventMirror.name} dropped ${event.type}: ${describeError(error)}`);
      });
    }
  }

  private currentFrame(): Frame | undefined {
    const operation = this.context.getStore();
    if (!operation || operation.closed) return undefined;
    return operation.frames[operation.frames.length - 1];
  }
}
