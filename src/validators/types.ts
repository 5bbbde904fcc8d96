// src/validators/types.ts

import type { ConfigObject } from '../config/schema.js';

export type Severity = 'error' | 'warning';

/**
 * Identifies which rule produced a diagnostic.
 */
export type RuleId =
  | 'document-shape'
  | 'required-field'
  | 'name-format'
  | 'deployment'
  | 'package'
  | 'remote'
  | 'recommended-field'
  | 'repository';

/**
 * A single finding with field path, message, and severity.
 */
export interface Diagnostic {
  rule: RuleId;
  field: string;
  message: string;
  severity: Severity;
}

/**
 * Shared context passed to all validators during validation.
 */
export interface ValidationContext {
  document: ConfigObject;
  diagnostics: Diagnostic[];
}

/**
 * Outcome of validating one document. `errors` and `warnings` hold the
 * rendered messages of `diagnostics`, split by severity, in rule order.
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  diagnostics: Diagnostic[];
}

/**
 * Interface for all validators.
 * Validators are composed by the ValidationOrchestrator and executed in registration order.
 */
export interface Validator {
  /** Unique identifier for this validator */
  readonly name: RuleId;

  /**
   * Check if this validator should run given current context.
   * Allows conditional validators to self-exclude.
   */
  shouldRun(context: ValidationContext): boolean;

  /**
   * Perform validation, appending to context.diagnostics.
   * Must not throw for any document content.
   */
  validate(context: ValidationContext): void;
}
