import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { validateServerCommand } from '../../../cli/commands/validate.js';
import { createTempDir, cleanupTempDir } from '../../setup.js';
import { Logger, LogLevel } from '../../../utils/logger.js';
import { completeServerConfig, npmServerConfig } from '../../fixtures/server-configs.js';

describe('validateServerCommand', () => {
  let tempDir: string;
  let processExitSpy: MockInstance<typeof process.exit>;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  const printed = (): string =>
    consoleLogSpy.mock.calls.map(call => String(call[0])).join('\n');

  async function writeManifest(content: string, fileName = 'server.json'): Promise<void> {
    await fs.writeFile(path.join(tempDir, fileName), content, 'utf-8');
  }

  beforeEach(async () => {
    tempDir = await createTempDir('validate-command-test-');

    processExitSpy = vi.spyOn(process, 'exit').mockImplementation((code?: string | number | null) => {
      throw new Error(`process.exit(${code})`);
    });
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  describe('valid manifests', () => {
    it('should exit 0 with warnings for a minimal manifest', async () => {
      await writeManifest(JSON.stringify(npmServerConfig));

      await expect(validateServerCommand(tempDir)).rejects.toThrow('process.exit(0)');

      expect(processExitSpy).toHaveBeenCalledWith(0);
      expect(printed().split('\n')).toEqual([
        'Validating server.json...',
        '',
        '⚠️  WARNINGS:',
        '  • Recommended field missing: license',
        '  • Recommended field missing: homepage',
        '  • Recommended field missing: repository',
        '',
        '✅ server.json is valid (with warnings above)',
        '',
        '📋 Configuration Summary:',
        '  Name: io.github.acme/tool',
        '  Version: 1.0.0',
        '  Description: A tool...',
        '  License: Not specified',
        '  Homepage: Not specified',
        '  Packages: 1',
        '  Remotes: 0',
      ]);
    });

    it('should report a complete manifest as looking good', async () => {
      await writeManifest(JSON.stringify(completeServerConfig));

      await expect(validateServerCommand(tempDir)).rejects.toThrow('process.exit(0)');

      expect(consoleLogSpy).toHaveBeenCalledWith('✅ server.json looks good!');
    });

    it('should validate a custom file', async () => {
      await writeManifest(JSON.stringify(completeServerConfig), 'manifest.json');

      await expect(validateServerCommand(tempDir, 'manifest.json')).rejects.toThrow('process.exit(0)');

      expect(consoleLogSpy).toHaveBeenCalledWith('Validating manifest.json...\n');
      expect(consoleLogSpy).toHaveBeenCalledWith('✅ manifest.json looks good!');
    });
  });

  it('should log the resolved manifest path at debug level', async () => {
    await writeManifest(JSON.stringify(completeServerConfig));
    const consoleDebugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    Logger.setLevel(LogLevel.DEBUG);

    try {
      await expect(validateServerCommand(tempDir)).rejects.toThrow('process.exit(0)');
    } finally {
      Logger.setLevel(LogLevel.INFO);
    }

    expect(consoleDebugSpy).toHaveBeenCalledWith(
      `🔍 ${path.join(tempDir, 'server.json')}: 0 error(s), 0 warning(s)`
    );
  });

  describe('invalid manifests', () => {
    it('should exit 1 and still print the summary for an empty document', async () => {
      await writeManifest('{}');

      await expect(validateServerCommand(tempDir)).rejects.toThrow('process.exit(1)');

      const lines = printed().split('\n');
      expect(lines.slice(2, 8)).toEqual([
        '❌ ERRORS:',
        '  • Missing required field: name',
        '  • Missing required field: version',
        '  • Missing required field: description',
        '  • Must have at least one package or remote deployment',
        '',
      ]);
      expect(lines).toContain('❌ server.json has validation errors');
      expect(lines).toContain('📋 Configuration Summary:');
    });

    it('should reject a root that is not an object', async () => {
      await writeManifest('["io.github.acme/tool"]');

      await expect(validateServerCommand(tempDir)).rejects.toThrow('process.exit(1)');

      expect(consoleLogSpy).toHaveBeenCalledWith(
        '❌ ERRORS:\n  • Configuration must be a JSON object\n\n❌ server.json has validation errors'
      );
    });
  });

  describe('load failures', () => {
    it('should exit 1 without validating when the file is missing', async () => {
      await expect(validateServerCommand(tempDir)).rejects.toThrow('process.exit(1)');

      expect(consoleErrorSpy).toHaveBeenCalledWith('❌ Error: server.json not found');
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    it('should exit 1 without validating when the JSON is malformed', async () => {
      await writeManifest('{"name": "io.github.acme/tool",');

      await expect(validateServerCommand(tempDir)).rejects.toThrow('process.exit(1)');

      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
      expect(String(consoleErrorSpy.mock.calls[0][0])).toMatch(/^❌ Error: Invalid JSON in server\.json: /);
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    it('should report other read failures', async () => {
      await fs.mkdir(path.join(tempDir, 'server.json'));

      await expect(validateServerCommand(tempDir)).rejects.toThrow('process.exit(1)');

      expect(String(consoleErrorSpy.mock.calls[0][0])).toMatch(/^❌ Failed to read server\.json: /);
    });
  });
});
