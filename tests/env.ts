// Loaded before any module so config resolves the test environment
process.env.NODE_ENV = 'test';
process.env.JWT_SECRET = 'test-secret';
delete process.env.JWT_ISSUER;
delete process.env.JWT_AUDIENCE;
delete process.env.RAIL_MODE;
delete process.env.RAIL_TIMEOUT_MS;
delete process.env.RAIL_TRANSFER_FEE;
delete process.env.RATE_LIMIT_DISABLED;
