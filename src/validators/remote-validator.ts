// src/validators/remote-validator.ts

import { asConfigObject, classifyTransport, formatValue, hasField } from '../config/schema.js';
import { getDeploymentEntries } from './deployment-validator.js';
import type { Validator, ValidationContext } from './types.js';

/**
 * Validates each remote entry has an endpoint and a known transport.
 */
export class RemoteValidator implements Validator {
  readonly name = 'remote' as const;

  shouldRun(context: ValidationContext): boolean {
    return getDeploymentEntries(context.document, 'remotes') !== undefined;
  }

  validate(context: ValidationContext): void {
    const { diagnostics } = context;
    const remotes = getDeploymentEntries(context.document, 'remotes') ?? [];

    remotes.forEach((entry, index) => {
      const field = `remotes[${index}]`;
      const remote = asConfigObject(entry);

      if (!remote) {
        diagnostics.push({
          rule: this.name,
          field,
          message: `Remote ${index}: Entry must be an object`,
          severity: 'error',
        });
        return;
      }

      if (!hasField(remote, 'endpoint')) {
        diagnostics.push({
          rule: this.name,
          field: `${field}.endpoint`,
          message: `Remote ${index}: Missing 'endpoint' field`,
          severity: 'error',
        });
      }

      if (!hasField(remote, 'transport')) {
        diagnostics.push({
          rule: this.name,
          field: `${field}.transport`,
          message: `Remote ${index}: Missing 'transport' field`,
          severity: 'error',
        });
        return;
      }

      const transport = classifyTransport(remote.transport);
      if (transport.kind === 'unknown') {
        diagnostics.push({
          rule: this.name,
          field: `${field}.transport`,
          message: `Remote ${index}: Unknown transport '${formatValue(transport.raw)}'`,
          severity: 'warning',
        });
      }
    });
  }
}
