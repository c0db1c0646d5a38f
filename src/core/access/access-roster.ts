/**
 * BNPL Credit Protocol - Access Roster
 * THE PERMISSION TABLE: one admin, one holder per privileged relationship.
 *
 * Every privileged entry point asks the roster whether the immediate caller
 * holds the capability for that relationship. There is no role hierarchy:
 * holding one capability grants nothing else.
 */

import { ProtocolRuntime, PersistenceSession, PersistentParticipant, TrackedCell, TrackedMap } from '../runtime';
import { ProtocolError } from '../../shared/errors';
import { Address } from '../../shared/types';
import { requireAddress } from '../../shared/validation';
import { AccessRepository } from './access.repository';
import { Capability } from './capabilities';

export class AccessRoster implements PersistentParticipant {
  readonly name = 'AccessRoster';

  private readonly admin: TrackedCell<Address>;
  private readonly grants: TrackedMap<Capability, Address>;

  constructor(
    private readonly runtime: ProtocolRuntime,
    admin: Address,
    private readonly repository?: AccessRepository
  ) {
    requireAddress(admin, 'admin');
    this.admin = new TrackedCell(runtime, admin);
    this.grants = new TrackedMap(runtime);
  }

  getAdmin(): Address {
    return this.admin.get();
  }

  isAdmin(address: Address): boolean {
    return this.admin.get() === address;
  }

  holderOf(capability: Capability): Address | null {
    return this.grants.get(capability) ?? null;
  }

  requireAdmin(caller: Address, action: string): void {
    if (!this.isAdmin(caller)) {
      throw new ProtocolError('UNAUTHORIZED', `${action}: caller ${caller} is not admin`);
    }
  }

  authorize(capability: Capability, caller: Address, action: string): void {
    if (this.grants.get(capability) !== caller) {
      throw new ProtocolError('UNAUTHORIZED', `${action}: caller ${caller} does not hold ${capability}`);
    }
  }

  authorizeAdminOr(capability: Capability, caller: Address, action: string): void {
    if (this.isAdmin(caller)) return;
    this.authorize(capability, caller, action);
  }

  // ============================================
  // ADMIN MUTATIONS
  // ============================================

  /**
   * Assign the single holder of a capability (replaces any previous holder)
   */
  async grant(caller: Address, capability: Capability, holder: Address): Promise<void> {
    return this.runtime.execute('AccessRoster.grant', async () => {
      this.requireAdmin(caller, 'grant');
      requireAddress(holder, 'holder');
      this.grants.set(capability, holder);
      console.log(`[AccessRoster] ${capability} -> ${holder}`);
    });
  }

  async transferAdmin(caller: Address, next: Address): Promise<void> {
    return this.runtime.execute('AccessRoster.transferAdmin', async () => {
      this.requireAdmin(caller, 'transferAdmin');
      requireAddress(next, 'next admin');
      this.admin.set(next);
      console.log(`[AccessRoster] Admin transferred to ${next}`);
    });
  }

  // ============================================
  // PERSISTENCE
  // ============================================

  async hydrate(): Promise<void> {
    if (!this.repository) return;

    const stored = await this.repository.load();
    if (stored.admin) {
      this.admin.hydrate(stored.admin);
    }
    for (const [capability, holder] of stored.grants) {
      this.grants.hydrate(capability, holder);
    }
  }

  async flush(session: PersistenceSession): Promise<void> {
    if (!this.repository) return;

    const admin = this.admin.drainDirty();
    if (admin) {
      await this.repository.saveHolder(session, 'ADMIN', admin);
    }
    for (const [capability, holder] of this.grants.drainDirty()) {
      await this.repository.saveHolder(session, capability, holder);
    }
  }
}
