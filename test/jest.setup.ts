// Increase timeout for all tests
jest.setTimeout(30000);
