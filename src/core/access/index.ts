export { AccessRoster } from './access-roster';
export { Capability, CAPABILITIES, isCapability } from './capabilities';
export { AccessRepository, StoredRoster } from './access.repository';
