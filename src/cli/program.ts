// src/cli/program.ts - Commander program factory

import { Command, CommanderError } from 'commander';
import * as fs from 'fs/promises';

import { Logger } from '../utils/logger.js';
import { DEFAULT_CONFIG_FILE } from '../config/server-config-loader.js';
import { validateServerCommand } from './commands/validate.js';

interface PackageInfo {
  version: string;
}

async function readPackageInfo(): Promise<PackageInfo> {
  const pkgPath = new URL('../../package.json', import.meta.url);
  const pkg: unknown = JSON.parse(await fs.readFile(pkgPath, 'utf-8'));
  const version =
    typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
      ? pkg.version
      : '0.0.0';
  return { version };
}

export async function createProgram(repoPath: string = process.cwd()): Promise<Command> {
  const pkg = await readPackageInfo();

  const program = new Command();

  program
    .name('server-config-lint')
    .version(`server-config-lint v${pkg.version}`, '-v, --version')
    .description('Validate a server.json manifest for package and remote deployments')
    .option('--debug', 'Enable debug logging (also enabled by DEBUG=1)')
    .exitOverride();

  program.hook('preAction', () => {
    Logger.configure(program.opts<{ debug?: boolean }>());
  });

  program
    .command('validate', { isDefault: true })
    .description('Check manifest structure, deployments, and recommended metadata')
    .argument('[file]', 'Manifest file to validate', DEFAULT_CONFIG_FILE)
    .action(async (file: string) => {
      await validateServerCommand(repoPath, file);
    });

  return program;
}

export { CommanderError };
