// Payload merging
//
// Writes a payload into one session and records, for every property it
// touched, the value the model's best session held before the update.
// Deciding whether those changes are announced is the model's job.

import type { ModelPayload, PropertyValue, Session } from '@castwatch/protocol';
import { isPropertyGroup } from '@castwatch/protocol';
import { DERIVED_FLAG_KEYS, decodeSessionFlags } from './sessions.js';

/**
 * A property whose value may have changed during a merge
 */
export type PropertyChange = {
  property: string;
  before: PropertyValue;
  after: PropertyValue;
};

function valueOf(session: Session, property: string): PropertyValue {
  return session[property] ?? null;
}

/**
 * Apply a payload to the target session.
 *
 * Property groups are flattened into the session. A `flags` entry inside a
 * group also sets the decoded session flags, which are not recorded as
 * changes.
 *
 * @param target - Session the payload is written into (mutated)
 * @param baseline - Best session before the update, the source of `before` values
 * @param payload - The update
 * @returns One entry per property written, in payload order
 */
export function applyPayload(target: Session, baseline: Session, payload: ModelPayload): PropertyChange[] {
  const changes: PropertyChange[] = [];

  const write = (property: string, value: PropertyValue) => {
    changes.push({ property, before: valueOf(baseline, property), after: value });
    target[property] = value;
  };

  for (const [field, value] of Object.entries(payload)) {
    if (value === undefined) {
      continue;
    }

    if (!isPropertyGroup(value)) {
      write(field, value);
      continue;
    }

    for (const [property, entry] of Object.entries(value)) {
      write(property, entry);
      if (property === 'flags' && typeof entry === 'number') {
        Object.assign(target, decodeSessionFlags(entry));
      }
    }
  }

  return changes;
}

/**
 * Properties the baseline had that the updated session lacks.
 * Used when an update moved the model to a different session: those
 * properties are now cleared. Decoded flag fields are left out.
 */
export function collectClearedProperties(baseline: Session, updated: Session): PropertyChange[] {
  const cleared: PropertyChange[] = [];
  for (const property of Object.keys(baseline)) {
    if (!(property in updated) && !DERIVED_FLAG_KEYS.has(property)) {
      cleared.push({ property, before: valueOf(baseline, property), after: null });
    }
  }
  return cleared;
}

/**
 * Drop the changes whose value did not actually change.
 */
export function effectiveChanges(changes: readonly PropertyChange[]): PropertyChange[] {
  return changes.filter((change) => change.before !== change.after);
}
