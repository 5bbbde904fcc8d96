// src/validators/repository-validator.ts

import { asConfigObject, hasField } from '../config/schema.js';
import type { Validator, ValidationContext } from './types.js';

/**
 * Validates the repository block when one is declared.
 */
export class RepositoryValidator implements Validator {
  readonly name = 'repository' as const;

  shouldRun(context: ValidationContext): boolean {
    return hasField(context.document, 'repository');
  }

  validate(context: ValidationContext): void {
    const { document, diagnostics } = context;
    const repository = asConfigObject(document.repository);

    if (!repository) {
      diagnostics.push({
        rule: this.name,
        field: 'repository',
        message: 'Repository must be an object',
        severity: 'error',
      });
      return;
    }

    if (!hasField(repository, 'type')) {
      diagnostics.push({
        rule: this.name,
        field: 'repository.type',
        message: "Repository missing 'type' field",
        severity: 'warning',
      });
    }

    if (!hasField(repository, 'url')) {
      diagnostics.push({
        rule: this.name,
        field: 'repository.url',
        message: "Repository missing 'url' field",
        severity: 'warning',
      });
    }
  }
}
