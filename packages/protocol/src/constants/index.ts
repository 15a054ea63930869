// Protocol constants shared with the chat server

/**
 * Video states a session can report.
 * Anything not listed here is still stored; only `Offline` is special.
 */
export const VideoState = {
  Online: 0,
  Away: 2,
  Private: 12,
  Group: 13,
  Club: 14,
  Offline: 127,
} as const;

export type VideoState = (typeof VideoState)[keyof typeof VideoState];

/**
 * Bits of the `flags` bitmask carried in a property group
 */
export const ModelFlag = {
  TruePrivate: 1 << 3,
  GuestsMuted: 1 << 4,
  BasicsMuted: 1 << 5,
  OfficialSoftware: 1 << 6,
} as const;

export type ModelFlag = (typeof ModelFlag)[keyof typeof ModelFlag];

/**
 * Access level of whoever produced a payload
 */
export const ProducerLevel = {
  Guest: 0,
  Basic: 1,
  Premium: 2,
  Model: 4,
  Admin: 5,
} as const;

export type ProducerLevel = (typeof ProducerLevel)[keyof typeof ProducerLevel];

/**
 * Reserved id of the aggregate model that mirrors every other model's events
 */
export const AGGREGATE_MODEL_ID = -500;
