/**
 * Test environment
 * Loaded before every test file, ahead of any module that reads env.
 */
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
process.env.LOGGER_TYPE = 'json';
process.env.METRICS_TYPE = 'noop';
process.env.POLYGON_API_KEY = 'test-key';
