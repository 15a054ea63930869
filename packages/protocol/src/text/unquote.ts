// Percent-decoding for server strings
//
// The server sends some strings (names, topics) run through
// encodeURIComponent and others as plain text, without saying which.
// A string is only decoded when encoding the decoded text gives back
// exactly what was received.

import type { PropertyValue } from '../types/common.js';
import type { ModelPayload } from '../types/payloads.js';
import { isPropertyGroup } from '../validation/payload.js';

/**
 * Anything unquoteAny can walk
 */
export type Unquotable = PropertyValue | Unquotable[] | { [key: string]: Unquotable };

/**
 * Decode a string that may or may not be percent-encoded.
 *
 * @example
 * ```typescript
 * unquoteString('Alice%20Smith'); // 'Alice Smith'
 * unquoteString('100% real');     // '100% real'
 * ```
 */
export function unquoteString(text: string): string {
  let decoded: string;
  try {
    decoded = decodeURIComponent(text);
  } catch {
    // Malformed escape sequence: the text was never encoded
    return text;
  }

  if (decoded === text) {
    return text;
  }

  return encodeURIComponent(decoded) === text ? decoded : text;
}

/**
 * Recursively decode every string inside a value.
 * Arrays and objects are copied, never mutated.
 */
export function unquoteAny(value: Unquotable): Unquotable {
  if (typeof value === 'string') {
    return unquoteString(value);
  }

  if (Array.isArray(value)) {
    return value.map(unquoteAny);
  }

  if (value !== null && typeof value === 'object') {
    const result: { [key: string]: Unquotable } = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = unquoteAny(entry);
    }
    return result;
  }

  return value;
}

/**
 * Decode every string property of a payload, including inside property groups
 */
export function unquotePayload(payload: ModelPayload): ModelPayload {
  const result: ModelPayload = {};

  for (const [field, value] of Object.entries(payload)) {
    if (value === undefined) {
      continue;
    }

    if (isPropertyGroup(value)) {
      const group: Record<string, PropertyValue> = {};
      for (const [property, entry] of Object.entries(value)) {
        group[property] = typeof entry === 'string' ? unquoteString(entry) : entry;
      }
      result[field] = group;
    } else {
      result[field] = typeof value === 'string' ? unquoteString(value) : value;
    }
  }

  return result;
}
