#!/usr/bin/env node

/**
 * Configuration Validation Script
 * Validates the configuration without starting the server
 */

import { getConfig } from './index.js';
import { toError } from '../errors/index.js';

try {
  console.error('Validating configuration...');
  const config = getConfig();
  console.error('Configuration is valid!');
  console.log(JSON.stringify(config, null, 2));
  process.exit(0);
} catch (error) {
  console.error('Configuration validation failed:');
  console.error(toError(error).message);
  process.exit(1);
}
