// Set test environment before any source module reads it
process.env.NODE_ENV = 'test';
process.env.LEDGER_STORE = 'memory';
delete process.env.LEDGER_JOURNAL_PATH;
delete process.env.PROVISIONED_CLIENTS;

// Increase test timeout
jest.setTimeout(30000);
