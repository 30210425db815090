/**
 * Jest Environment Setup
 * Runs BEFORE test framework is installed
 */

// Set test environment variables
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';

// Tracing is opted into per test, never inherited from the shell.
delete process.env.FUSION_RING_TRACE_REACTIONS;
delete process.env.ELEMENT_CATALOG_PATH;
