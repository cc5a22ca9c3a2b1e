import { EntityLockTable, lockKey } from '../../../src/services/transfer/entity.lock';
import { entityLockContentionTotal } from '../../../src/observability/metrics';

describe('EntityLockTable', () => {
  let locks: EntityLockTable;

  beforeEach(() => {
    locks = new EntityLockTable();
    entityLockContentionTotal.reset();
  });

  it('should key locks by entity type and id', () => {
    expect(lockKey({ type: 'campaign', id: 'c1' })).toBe('campaign:c1');
    expect(lockKey({ type: 'provider', id: 'c1' })).toBe('provider:c1');
  });

  it('should grant a free lock', () => {
    expect(locks.tryAcquire({ type: 'campaign', id: 'c1' })).toBe(true);
    expect(locks.isLocked({ type: 'campaign', id: 'c1' })).toBe(true);
    expect(locks.size).toBe(1);
  });

  it('should refuse a held lock without waiting', async () => {
    locks.tryAcquire({ type: 'campaign', id: 'c1' });

    expect(locks.tryAcquire({ type: 'campaign', id: 'c1' })).toBe(false);

    const contention = await entityLockContentionTotal.get();
    expect(contention.values).toEqual([
      expect.objectContaining({ value: 1, labels: { entity_type: 'campaign' } }),
    ]);
  });

  it('should treat a campaign and a provider with the same id as different entities', () => {
    expect(locks.tryAcquire({ type: 'campaign', id: 'x' })).toBe(true);
    expect(locks.tryAcquire({ type: 'provider', id: 'x' })).toBe(true);
    expect(locks.size).toBe(2);
  });

  it('should grant the lock again after release', () => {
    locks.tryAcquire({ type: 'provider', id: 'p1' });
    locks.release({ type: 'provider', id: 'p1' });

    expect(locks.isLocked({ type: 'provider', id: 'p1' })).toBe(false);
    expect(locks.tryAcquire({ type: 'provider', id: 'p1' })).toBe(true);
  });

  it('should ignore the release of a lock that is not held', () => {
    locks.release({ type: 'campaign', id: 'missing' });
    expect(locks.size).toBe(0);
  });
});
