// Payload types - decoded partial state updates

import type { PropertyGroup, PropertyValue } from './common.js';

/**
 * A decoded model update as delivered by the transport layer.
 *
 * Every top-level field is either a flat property or a property group
 * whose entries are flattened into the session.
 *
 * @example
 * ```typescript
 * const payload: ModelPayload = {
 *   sessionId: 4120,
 *   level: ProducerLevel.Model,
 *   videoState: VideoState.Online,
 *   name: 'Alice',
 *   model: { flags: ModelFlag.OfficialSoftware, camscore: 812.5 },
 *   user: { avatar: 1 },
 * };
 * ```
 */
export type ModelPayload = {
  /**
   * Target session; updates without one go to session 0
   */
  sessionId?: number;

  /**
   * Access level of the producer; must match the expected model level
   */
  level?: number;

  [field: string]: PropertyValue | PropertyGroup | undefined;
};
