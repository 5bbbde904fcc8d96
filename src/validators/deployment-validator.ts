// src/validators/deployment-validator.ts

import { type ConfigObject, isEmptyValue } from '../config/schema.js';
import type { Validator, ValidationContext } from './types.js';

export type DeploymentField = 'packages' | 'remotes';

/**
 * Entries of `packages` or `remotes`, or undefined unless the field is a
 * non-empty array.
 */
export function getDeploymentEntries(
  document: ConfigObject,
  field: DeploymentField
): unknown[] | undefined {
  const value = document[field];
  return Array.isArray(value) && value.length > 0 ? value : undefined;
}

/**
 * Validates that the server declares at least one package or remote.
 */
export class DeploymentValidator implements Validator {
  readonly name = 'deployment' as const;

  shouldRun(): boolean {
    return true; // Always runs
  }

  validate(context: ValidationContext): void {
    const { document, diagnostics } = context;

    for (const field of ['packages', 'remotes'] as const) {
      const value = document[field];
      if (!isEmptyValue(value) && !Array.isArray(value)) {
        diagnostics.push({
          rule: this.name,
          field,
          message: `Field '${field}' must be an array`,
          severity: 'error',
        });
      }
    }

    const hasPackages = getDeploymentEntries(document, 'packages') !== undefined;
    const hasRemotes = getDeploymentEntries(document, 'remotes') !== undefined;

    if (!hasPackages && !hasRemotes) {
      diagnostics.push({
        rule: this.name,
        field: '$',
        message: 'Must have at least one package or remote deployment',
        severity: 'error',
      });
    }
  }
}
