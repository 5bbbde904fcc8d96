// src/validators/required-fields-validator.ts

import { hasField, isEmptyValue } from '../config/schema.js';
import type { Validator, ValidationContext } from './types.js';

export const REQUIRED_FIELDS = ['name', 'version', 'description'] as const;

/**
 * Validates that name, version, and description are present and non-empty.
 */
export class RequiredFieldsValidator implements Validator {
  readonly name = 'required-field' as const;

  shouldRun(): boolean {
    return true; // Always runs
  }

  validate(context: ValidationContext): void {
    const { document, diagnostics } = context;

    for (const field of REQUIRED_FIELDS) {
      if (!hasField(document, field)) {
        diagnostics.push({
          rule: this.name,
          field,
          message: `Missing required field: ${field}`,
          severity: 'error',
        });
      } else if (isEmptyValue(document[field])) {
        diagnostics.push({
          rule: this.name,
          field,
          message: `Field '${field}' cannot be empty`,
          severity: 'error',
        });
      }
    }
  }
}
