// src/validators/validation-orchestrator.ts

import { asConfigObject } from '../config/schema.js';
import { Logger } from '../utils/logger.js';
import type { Diagnostic, ValidationContext, ValidationResult, Validator } from './types.js';

import { RequiredFieldsValidator } from './required-fields-validator.js';
import { NameFormatValidator } from './name-format-validator.js';
import { DeploymentValidator } from './deployment-validator.js';
import { PackageValidator } from './package-validator.js';
import { RemoteValidator } from './remote-validator.js';
import { RecommendedFieldsValidator } from './recommended-fields-validator.js';
import { RepositoryValidator } from './repository-validator.js';

/**
 * Orchestrates validation by composing multiple validators.
 * Validators run in registration order, which is also the order of the
 * emitted diagnostics.
 */
export class ValidationOrchestrator {
  private validators: Validator[] = [];

  constructor() {
    this.register(new RequiredFieldsValidator());
    this.register(new NameFormatValidator());
    this.register(new DeploymentValidator());
    this.register(new PackageValidator());
    this.register(new RemoteValidator());
    this.register(new RecommendedFieldsValidator());
    this.register(new RepositoryValidator());
  }

  register(validator: Validator): void {
    this.validators.push(validator);
  }

  /**
   * Run all registered validators against a decoded document.
   * A root that is not an object fails fast with a single error.
   */
  validate(input: unknown): ValidationResult {
    const document = asConfigObject(input);

    if (!document) {
      return toResult([
        {
          rule: 'document-shape',
          field: '$',
          message: 'Configuration must be a JSON object',
          severity: 'error',
        },
      ]);
    }

    const context: ValidationContext = {
      document,
      diagnostics: [],
    };

    for (const validator of this.validators) {
      if (validator.shouldRun(context)) {
        const before = context.diagnostics.length;
        validator.validate(context);
        Logger.debug(`Validator ${validator.name}: ${context.diagnostics.length - before} finding(s)`);
      } else {
        Logger.debug(`Validator ${validator.name}: skipped`);
      }
    }

    return toResult(context.diagnostics);
  }
}

function toResult(diagnostics: Diagnostic[]): ValidationResult {
  const errors = diagnostics.filter(d => d.severity === 'error').map(d => d.message);
  const warnings = diagnostics.filter(d => d.severity === 'warning').map(d => d.message);

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    diagnostics,
  };
}

/**
 * Validate a decoded server.json document with the default rule set.
 */
export function validateServerConfig(document: unknown): ValidationResult {
  return new ValidationOrchestrator().validate(document);
}
