// Session types - one state snapshot for a model

import type { PropertyValue } from './common.js';

/**
 * A Session holds everything the server has told us about one broadcast
 * session of a model. Several may coexist while a model moves between
 * sessions (for example when switching broadcasting software).
 *
 * The four named keys are present on every session once it exists.
 * Everything else is written dynamically from update payloads, so the
 * named keys are typed like any other property: a payload may overwrite
 * them with whatever the server sent.
 */
export type Session = {
  /**
   * Session id, 0 when the server did not supply one
   */
  sessionId: PropertyValue;

  /**
   * Id of the model this session belongs to
   */
  modelId: PropertyValue;

  /**
   * Video state, see `VideoState`
   */
  videoState: PropertyValue;

  /**
   * Rank reported by the server
   */
  rank: PropertyValue;

  [property: string]: PropertyValue;
};

/**
 * Flags decoded from the `flags` bitmask of a property group.
 * Stored on the session but never announced as individual changes.
 */
export type SessionFlags = {
  truePrivate: boolean;
  guestsMuted: boolean;
  basicsMuted: boolean;
  officialSoftware: boolean;
};
