// Registry options
//
// Everything configurable about a registry is passed in when it is
// created; there is no global configuration.

import { z } from 'zod';
import { ProducerLevel } from '@castwatch/protocol';
import { ValidationError } from './errors.js';
import { consoleLogger, type Logger } from './logging.js';

/**
 * Options for creating a model registry
 */
export type ModelRegistryOptions = {
  /**
   * Where diagnostics go (default: console)
   */
  logger?: Logger;

  /**
   * Level every payload's `level` field must carry when present
   * (default: ProducerLevel.Model)
   */
  expectedLevel?: number;
};

/**
 * Options with every default filled in
 */
export type ResolvedRegistryOptions = {
  logger: Logger;
  expectedLevel: number;
};

const registryOptionsSchema = z.object({
  expectedLevel: z.number().int().nonnegative().default(ProducerLevel.Model),
});

/**
 * Apply defaults and validate registry options.
 *
 * @throws ValidationError if an option has the wrong shape
 */
export function resolveRegistryOptions(options: ModelRegistryOptions = {}): ResolvedRegistryOptions {
  const parsed = registryOptionsSchema.safeParse({ expectedLevel: options.expectedLevel });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(`Invalid registry options: ${issue.message}`, {
      field: issue.path.join('.'),
      details: { issues: parsed.error.issues.length },
    });
  }

  return {
    logger: options.logger ?? consoleLogger,
    expectedLevel: parsed.data.expectedLevel,
  };
}
