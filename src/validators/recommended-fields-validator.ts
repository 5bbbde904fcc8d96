// src/validators/recommended-fields-validator.ts

import { hasField } from '../config/schema.js';
import type { Validator, ValidationContext } from './types.js';

export const RECOMMENDED_FIELDS = ['license', 'homepage', 'repository'] as const;

/**
 * Warns about metadata a registry listing should carry. Only presence is
 * checked; empty values pass.
 */
export class RecommendedFieldsValidator implements Validator {
  readonly name = 'recommended-field' as const;

  shouldRun(): boolean {
    return true; // Always runs
  }

  validate(context: ValidationContext): void {
    const { document, diagnostics } = context;

    for (const field of RECOMMENDED_FIELDS) {
      if (!hasField(document, field)) {
        diagnostics.push({
          rule: this.name,
          field,
          message: `Recommended field missing: ${field}`,
          severity: 'warning',
        });
      }
    }
  }
}
