/**
 * Jest setup file - runs before all tests
 */

// Set test environment variables
process.env['NODE_ENV'] = 'test';
process.env['TOPO_MCP_LOG_LEVEL'] = 'error'; // Reduce noise in test output

// Never write log files from tests
process.env['TOPO_MCP_LOG_FILE_OUTPUT'] = 'false';
