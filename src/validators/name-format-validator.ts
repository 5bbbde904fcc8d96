// src/validators/name-format-validator.ts

import { formatValue, hasField } from '../config/schema.js';
import type { Validator, ValidationContext } from './types.js';

export const NAMESPACE_PREFIXES = ['io.github.', 'com.'] as const;

/**
 * Checks that the server name follows the namespace/name convention.
 * Both checks are warnings and run independently.
 */
export class NameFormatValidator implements Validator {
  readonly name = 'name-format' as const;

  shouldRun(context: ValidationContext): boolean {
    return hasField(context.document, 'name');
  }

  validate(context: ValidationContext): void {
    const { document, diagnostics } = context;
    const name = formatValue(document.name);

    if (!NAMESPACE_PREFIXES.some(prefix => name.startsWith(prefix))) {
      diagnostics.push({
        rule: this.name,
        field: 'name',
        message: `Name should use io.github.* or com.* namespace: ${name}`,
        severity: 'warning',
      });
    }

    if (!name.includes('/')) {
      diagnostics.push({
        rule: this.name,
        field: 'name',
        message: `Name should include a slash separator (namespace/name): ${name}`,
        severity: 'warning',
      });
    }
  }
}
