// Global test setup for Vitest
import { vi, afterEach } from 'vitest';
import chalk from 'chalk';
import * as fs from 'fs/promises';
import * as path from 'path';

// Plain output so formatted reports can be compared line by line
chalk.level = 0;

// Mock console methods to reduce noise in test output
global.console = {
  ...console,
  log: vi.fn(),
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

afterEach(async () => {
  vi.clearAllMocks();
  vi.restoreAllMocks();
});

// Helper function to create a temporary test directory
export async function createTempDir(prefix: string = 'test-'): Promise<string> {
  const tmpDir = path.join(process.cwd(), '.tmp', `${prefix}${Date.now()}-${Math.random().toString(36).slice(2)}`);
  await fs.mkdir(tmpDir, { recursive: true });
  return tmpDir;
}

// Helper function to clean up temporary directory
export async function cleanupTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}
