#!/usr/bin/env node

// src/index.ts - CLI entry point

import { createProgram, CommanderError } from './cli/program.js';
import { Logger } from './utils/logger.js';

async function main(): Promise<void> {
  const nodeVersion = process.version;
  const majorVersion = parseInt(nodeVersion.slice(1).split('.')[0], 10);
  if (majorVersion < 20) {
    console.error(`❌ Node.js 20+ required. Current: ${nodeVersion}`);
    console.error(`   Upgrade: https://nodejs.org/`);
    process.exit(1);
  }

  const program = await createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      process.exit(error.exitCode);
    }
    throw error;
  }
}

main().catch((error: unknown) => {
  Logger.error(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`);
  if (process.env.DEBUG) {
    console.error(error);
  }
  process.exit(1);
});
