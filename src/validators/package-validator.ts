// src/validators/package-validator.ts

import {
  type ConfigObject,
  asConfigObject,
  classifyPackageType,
  formatValue,
  hasField,
  isEmptyValue,
} from '../config/schema.js';
import { getDeploymentEntries } from './deployment-validator.js';
import type { Diagnostic, Validator, ValidationContext } from './types.js';

export const MCPB_PLATFORM_FIELDS = ['os', 'arch', 'uri', 'sha256'] as const;

/**
 * Validates each package entry: its type, and for mcpb bundles the
 * checksum, download URI, and per-platform binaries.
 */
export class PackageValidator implements Validator {
  readonly name = 'package' as const;

  shouldRun(context: ValidationContext): boolean {
    return getDeploymentEntries(context.document, 'packages') !== undefined;
  }

  validate(context: ValidationContext): void {
    const packages = getDeploymentEntries(context.document, 'packages') ?? [];

    packages.forEach((entry, index) => {
      const pkg = asConfigObject(entry);
      if (!pkg) {
        context.diagnostics.push(this.error(index, `Package ${index}: Entry must be an object`));
        return;
      }
      this.validatePackage(pkg, index, context.diagnostics);
    });
  }

  private validatePackage(pkg: ConfigObject, index: number, diagnostics: Diagnostic[]): void {
    const type = pkg.type;

    if (isEmptyValue(type)) {
      diagnostics.push(this.error(index, `Package ${index}: Missing 'type' field`, 'type'));
      return;
    }

    const classified = classifyPackageType(type);
    if (classified.kind === 'unknown') {
      diagnostics.push({
        rule: this.name,
        field: `packages[${index}].type`,
        message: `Package ${index}: Unknown package type '${formatValue(classified.raw)}'`,
        severity: 'warning',
      });
      return;
    }

    if (classified.value === 'mcpb') {
      this.validateMcpbPackage(pkg, index, diagnostics);
    }
  }

  private validateMcpbPackage(pkg: ConfigObject, index: number, diagnostics: Diagnostic[]): void {
    if (!hasField(pkg, 'uri')) {
      diagnostics.push(this.error(index, `Package ${index}: MCPB package missing 'uri' field`, 'uri'));
    }

    if (!hasField(pkg, 'sha256')) {
      diagnostics.push(this.error(index, `Package ${index}: MCPB package missing 'sha256' field`, 'sha256'));
    }

    const platforms = pkg.platforms;
    if (isEmptyValue(platforms)) {
      diagnostics.push(this.error(index, `Package ${index}: MCPB package missing 'platforms' array`, 'platforms'));
      return;
    }

    if (!Array.isArray(platforms)) {
      diagnostics.push(
        this.error(index, `Package ${index}: MCPB package 'platforms' must be an array`, 'platforms')
      );
      return;
    }

    platforms.forEach((entry: unknown, platformIndex) => {
      const prefix = `Package ${index}, Platform ${platformIndex}`;
      const field = `platforms[${platformIndex}]`;
      const platform = asConfigObject(entry);

      if (!platform) {
        diagnostics.push(this.error(index, `${prefix}: Entry must be an object`, field));
        return;
      }

      for (const required of MCPB_PLATFORM_FIELDS) {
        if (!hasField(platform, required)) {
          diagnostics.push(this.error(index, `${prefix}: Missing '${required}' field`, `${field}.${required}`));
        }
      }
    });
  }

  private error(index: number, message: string, subField?: string): Diagnostic {
    return {
      rule: this.name,
      field: subField ? `packages[${index}].${subField}` : `packages[${index}]`,
      message,
      severity: 'error',
    };
  }
}
