import { describe, it, expect, beforeEach } from 'vitest';
import { RecommendedFieldsValidator } from '../../validators/recommended-fields-validator.js';
import { completeServerConfig, createContext } from '../fixtures/server-configs.js';

describe('RecommendedFieldsValidator', () => {
  let validator: RecommendedFieldsValidator;

  beforeEach(() => {
    validator = new RecommendedFieldsValidator();
  });

  it('should have name "recommended-field"', () => {
    expect(validator.name).toBe('recommended-field');
  });

  it('should pass when license, homepage, and repository are set', () => {
    const context = createContext(completeServerConfig);

    validator.validate(context);

    expect(context.diagnostics).toHaveLength(0);
  });

  it('should warn about each missing field in order', () => {
    const context = createContext({});

    validator.validate(context);

    expect(context.diagnostics).toEqual([
      { rule: 'recommended-field', field: 'license', message: 'Recommended field missing: license', severity: 'warning' },
      { rule: 'recommended-field', field: 'homepage', message: 'Recommended field missing: homepage', severity: 'warning' },
      { rule: 'recommended-field', field: 'repository', message: 'Recommended field missing: repository', severity: 'warning' },
    ]);
  });

  it('should not check whether present fields are empty', () => {
    const context = createContext({ license: '', homepage: null, repository: {} });

    validator.validate(context);

    expect(context.diagnostics).toHaveLength(0);
  });
});
