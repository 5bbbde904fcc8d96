// src/utils/report-formatter.ts

import chalk from 'chalk';
import { type PackageEntry, type ServerConfig, readServerConfig } from '../config/schema.js';
import type { ValidationResult } from '../validators/types.js';

export const NOT_SPECIFIED = 'Not specified';
export const DESCRIPTION_PREVIEW_LENGTH = 60;

export class ReportFormatter {
  /**
   * ERRORS and WARNINGS blocks followed by the overall status line.
   */
  static formatResults(result: ValidationResult, fileLabel: string): string {
    const lines: string[] = [];

    if (result.errors.length > 0) {
      lines.push(chalk.red('❌ ERRORS:'));
      lines.push(...result.errors.map(error => `  • ${error}`));
      lines.push('');
    }

    if (result.warnings.length > 0) {
      lines.push(chalk.yellow('⚠️  WARNINGS:'));
      lines.push(...result.warnings.map(warning => `  • ${warning}`));
      lines.push('');
    }

    lines.push(this.formatStatus(result, fileLabel));

    return lines.join('\n');
  }

  static formatStatus(result: ValidationResult, fileLabel: string): string {
    if (result.errors.length > 0) {
      return chalk.red(`❌ ${fileLabel} has validation errors`);
    }
    if (result.warnings.length > 0) {
      return chalk.green(`✅ ${fileLabel} is valid (with warnings above)`);
    }
    return chalk.green(`✅ ${fileLabel} looks good!`);
  }

  /**
   * Configuration summary plus one platform block per mcpb package.
   */
  static formatSummary(document: unknown): string {
    const config = readServerConfig(document);
    const description = config.description ?? '';

    const lines: string[] = [
      '',
      chalk.bold('📋 Configuration Summary:'),
      `  Name: ${config.name ?? NOT_SPECIFIED}`,
      `  Version: ${config.version ?? NOT_SPECIFIED}`,
      `  Description: ${Array.from(description).slice(0, DESCRIPTION_PREVIEW_LENGTH).join('')}...`,
      `  License: ${config.license ?? NOT_SPECIFIED}`,
      `  Homepage: ${config.homepage ?? NOT_SPECIFIED}`,
      `  Packages: ${config.packages?.length ?? 0}`,
      `  Remotes: ${config.remotes?.length ?? 0}`,
    ];

    for (const pkg of this.getPlatformPackages(config)) {
      const platforms = pkg.platforms ?? [];
      lines.push('');
      lines.push(chalk.bold(`  🖥️  Platform Support (${platforms.length} platforms):`));
      for (const platform of platforms) {
        lines.push(`    • ${platform.os ?? 'unknown'}/${platform.arch ?? 'unknown'}`);
      }
    }

    return lines.join('\n');
  }

  static getExitCode(result: ValidationResult): 0 | 1 {
    return result.errors.length > 0 ? 1 : 0;
  }

  private static getPlatformPackages(config: ServerConfig): PackageEntry[] {
    return (config.packages ?? []).filter(
      pkg => pkg.type === 'mcpb' && (pkg.platforms?.length ?? 0) > 0
    );
  }
}
