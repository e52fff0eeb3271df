/**
 * Test Setup File
 * Runs before every test file, ahead of any module that reads the environment
 */

process.env.NODE_ENV = 'test';

// Quiet logs unless a run asks for them
if (process.env.LOG_SILENT === undefined) {
  process.env.LOG_SILENT = 'true';
}
if (process.env.LOG_LEVEL === undefined) {
  process.env.LOG_LEVEL = 'debug';
}
