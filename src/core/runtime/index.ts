/**
 * BNPL Credit Protocol - Runtime Module Export
 */

export {
  ProtocolRuntime,
  ProtocolRuntimeOptions,
  PersistenceSession,
  StatePersistence,
  StateStore,
  PersistentParticipant,
} from './protocol-runtime';
export { TrackedMap, TrackedCell, Journal } from './tracked-store';
export { ReentrancyGuard } from './reentrancy-guard';
export { Mutex } from './mutex';
