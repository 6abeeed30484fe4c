#!/usr/bin/env node

import 'dotenv/config';
import { handleCLIError, main } from '../cli/index.js';

/**
 * CLI entry point with proper error handling
 */
async function runCLI(): Promise<void> {
  try {
    const exitCode = await main();
    process.exit(exitCode);
  } catch (error) {
    handleCLIError(error);
    process.exit(1);
  }
}

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason) => {
  console.error('Unhandled rejection:', reason);
  process.exit(1);
});

// Run the CLI
void runCLI();
