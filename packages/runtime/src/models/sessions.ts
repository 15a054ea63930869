// Best-session selection
//
// A model can be known under several sessions at once, for example while
// switching from the web broadcaster to the official desktop software.
// Exactly one of them is authoritative for display and notification.

import { ModelFlag, VideoState } from '@castwatch/protocol';
import type { Id, Session, SessionFlags } from '@castwatch/protocol';

/**
 * Create the session row used before the server has told us anything.
 */
export function createDefaultSession(modelId: Id, sessionId: Id = 0): Session {
  return {
    sessionId,
    modelId,
    videoState: VideoState.Offline,
    rank: 0,
  };
}

/**
 * A session without a video state counts as offline.
 */
export function isOfflineSession(session: Session): boolean {
  const { videoState } = session;
  return videoState === undefined || videoState === null || videoState === VideoState.Offline;
}

/**
 * Session keys written by decodeSessionFlags. They are never announced.
 */
export const DERIVED_FLAG_KEYS: ReadonlySet<string> = new Set<keyof SessionFlags>([
  'truePrivate',
  'guestsMuted',
  'basicsMuted',
  'officialSoftware',
]);

/**
 * Decode the session flags carried in a `flags` bitmask.
 */
export function decodeSessionFlags(flags: number): SessionFlags {
  return {
    truePrivate: (flags & ModelFlag.TruePrivate) !== 0,
    guestsMuted: (flags & ModelFlag.GuestsMuted) !== 0,
    basicsMuted: (flags & ModelFlag.BasicsMuted) !== 0,
    officialSoftware: (flags & ModelFlag.OfficialSoftware) !== 0,
  };
}

/**
 * Choose the authoritative session id.
 *
 * Offline sessions never qualify. A session running the official
 * broadcasting software beats any session that isn't; within each class
 * the highest session id wins.
 *
 * @returns The chosen session id, or 0 when no session qualifies
 */
export function selectBestSessionId(sessions: ReadonlyMap<Id, Session>): Id {
  let best = 0;
  let foundOfficial = false;

  for (const [sessionId, session] of sessions) {
    if (isOfflineSession(session)) {
      continue;
    }

    if (session.officialSoftware === true) {
      if (!foundOfficial) {
        foundOfficial = true;
        best = sessionId;
      } else if (sessionId > best) {
        best = sessionId;
      }
    } else if (!foundOfficial && sessionId > best) {
      best = sessionId;
    }
  }

  return best;
}

/**
 * True when the session is a private show with the true-private flag set.
 */
export function isTruePrivate(session: Session): boolean {
  return session.videoState === VideoState.Private && session.truePrivate === true;
}
