// Common types used across the protocol

/**
 * Numeric identifier assigned by the chat server (model ids, session ids)
 */
export type Id = number;

/**
 * A single property value as it arrives in a decoded update.
 * Values are always scalars; nested structure only exists one level deep
 * in property groups.
 */
export type PropertyValue = string | number | boolean | null;

/**
 * A named group of properties inside a payload, e.g. `{ user: {...} }`.
 * Groups are flattened into the session when merged.
 */
export type PropertyGroup = {
  [property: string]: PropertyValue;
};
