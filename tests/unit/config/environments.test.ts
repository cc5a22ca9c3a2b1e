/**
 * Environment Configuration Unit Tests
 *
 * Parsing of values that would otherwise fail deep inside a transfer.
 */

import { ConfigurationError, parseTransferFee } from '../../../src/config/environments';

describe('parseTransferFee', () => {
  it('should default to 10000 when unset or empty', () => {
    expect(parseTransferFee(undefined)).toBe(10_000n);
    expect(parseTransferFee('')).toBe(10_000n);
  });

  it('should read a fee in the smallest unit', () => {
    expect(parseTransferFee('25000')).toBe(25_000n);
    expect(parseTransferFee(' 0 ')).toBe(0n);
  });

  it.each(['ten', '-5', '1.5', '1e4'])('should refuse %p with a ConfigurationError', (raw) => {
    expect(() => parseTransferFee(raw)).toThrow(ConfigurationError);
    expect(() => parseTransferFee(raw)).toThrow(
      `RAIL_TRANSFER_FEE must be a non-negative integer in the smallest unit, got "${raw}"`
    );
  });
});
