/**
 * Entity Lock Table
 *
 * Exclusive per-entity locks held across the rail call of an external
 * transfer. A busy entity is refused at once; nothing ever waits.
 */

import { EntityRef } from '../../types/custody';
import { entityLockContentionTotal, entityLocksHeld } from '../../observability/metrics';

export const lockKey = (ref: EntityRef): string => `${ref.type}:${ref.id}`;

export class EntityLockTable {
  private readonly held = new Set<string>();

  /**
   * Take the lock if it is free. Returns false, without waiting, when it is
   * already held.
   */
  tryAcquire(ref: EntityRef): boolean {
    const key = lockKey(ref);
    if (this.held.has(key)) {
      entityLockContentionTotal.inc({ entity_type: ref.type });
      return false;
    }
    this.held.add(key);
    entityLocksHeld.set(this.held.size);
    return true;
  }

  release(ref: EntityRef): void {
    this.held.delete(lockKey(ref));
    entityLocksHeld.set(this.held.size);
  }

  isLocked(ref: EntityRef): boolean {
    return this.held.has(lockKey(ref));
  }

  get size(): number {
    return this.held.size;
  }
}
