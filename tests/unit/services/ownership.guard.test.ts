import { requireOwner } from '../../../src/services/custody/ownership.guard';

describe('requireOwner', () => {
  it('should succeed when the caller owns the record', () => {
    expect(requireOwner('alice', 'alice')).toEqual({ ok: true, value: undefined });
  });

  it('should refuse any other caller with an Authorization error', () => {
    expect(requireOwner('alice', 'bob', 'fund your own campaigns')).toEqual({
      ok: false,
      error: { kind: 'Authorization', message: 'Unauthorized: You can only fund your own campaigns' },
    });
  });

  it('should fall back to a generic action', () => {
    expect(requireOwner('alice', 'bob')).toEqual({
      ok: false,
      error: { kind: 'Authorization', message: 'Unauthorized: You can only access your own records' },
    });
  });

  it('should compare identities exactly', () => {
    expect(requireOwner('alice', 'Alice').ok).toBe(false);
    expect(requireOwner('alice', 'alice ').ok).toBe(false);
  });
});
