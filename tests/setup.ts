// Increase test timeout
jest.setTimeout(30000);
