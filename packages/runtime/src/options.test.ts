// Tests for registry options

import { describe, it, expect } from 'vitest';
import { resolveRegistryOptions } from './options.js';
import { ValidationError } from './errors.js';
import { consoleLogger, silentLogger } from './logging.js';

describe('resolveRegistryOptions', () => {
  it('should fill in defaults', () => {
    expect(resolveRegistryOptions()).toEqual({ logger: consoleLogger, expectedLevel: 4 });
  });

  it('should keep supplied options', () => {
    const resolved = resolveRegistryOptions({ logger: silentLogger, expectedLevel: 2 });

    expect(resolved.logger).toBe(silentLogger);
    expect(resolved.expectedLevel).toBe(2);
  });

  it('should reject a non-integer level', () => {
    try {
      resolveRegistryOptions({ expectedLevel: 2.5 });
      expect.fail('expected resolveRegistryOptions to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.field).toBe('expectedLevel');
      }
    }
  });
});
