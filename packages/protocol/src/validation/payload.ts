// Payload Validation Utilities
//
// Validates decoded model updates before they reach the merge engine.
// The transport hands us whatever it decoded; this is the boundary where
// untyped input becomes a ModelPayload.

import { z } from 'zod';
import type { PropertyGroup } from '../types/common.js';
import type { ModelPayload } from '../types/payloads.js';

/**
 * Result of validating a payload
 */
export type PayloadValidationResult =
  | { valid: true; payload: ModelPayload; errors: [] }
  | { valid: false; errors: PayloadValidationError[] };

/**
 * A validation error with the path of the offending field
 */
export type PayloadValidationError = {
  path: string;
  message: string;
  code: PayloadValidationErrorCode;
};

/**
 * Validation error codes
 */
export type PayloadValidationErrorCode = 'INVALID_TYPE' | 'INVALID_VALUE';

const propertyValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const propertyGroupSchema = z.record(z.string(), propertyValueSchema);

/**
 * Schema for a decoded model update.
 * Unknown fields are kept: any scalar or one level of grouped scalars.
 */
export const modelPayloadSchema = z
  .object({
    sessionId: z.number().int().nonnegative().optional(),
    level: z.number().int().optional(),
  })
  .catchall(z.union([propertyValueSchema, propertyGroupSchema]));

function toValidationError(issue: z.ZodIssue): PayloadValidationError {
  return {
    path: issue.path.length > 0 ? issue.path.join('.') : 'payload',
    message: issue.message,
    code: issue.code === z.ZodIssueCode.invalid_type ? 'INVALID_TYPE' : 'INVALID_VALUE',
  };
}

/**
 * Validate an unknown value as a model payload.
 *
 * @param input - Decoded update from the transport
 * @returns The typed payload, or the list of problems found
 *
 * @example
 * ```typescript
 * const result = parseModelPayload(JSON.parse(frame));
 * if (result.valid) {
 *   registry.getOrCreate(modelId).merge(result.payload);
 * }
 * ```
 */
export function parseModelPayload(input: unknown): PayloadValidationResult {
  const result = modelPayloadSchema.safeParse(input);
  if (!result.success) {
    return { valid: false, errors: result.error.issues.map(toValidationError) };
  }
  return { valid: true, payload: result.data, errors: [] };
}

/**
 * Check whether a payload field holds a property group rather than a scalar
 */
export function isPropertyGroup(value: ModelPayload[string]): value is PropertyGroup {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
