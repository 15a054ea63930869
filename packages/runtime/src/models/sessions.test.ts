// Tests for best-session selection

import { describe, it, expect } from 'vitest';
import { ModelFlag, VideoState } from '@castwatch/protocol';
import type { PropertyValue, Session } from '@castwatch/protocol';
import {
  createDefaultSession,
  decodeSessionFlags,
  isOfflineSession,
  isTruePrivate,
  selectBestSessionId,
} from './sessions.js';

function onlineSession(sessionId: number, extra: Record<string, PropertyValue> = {}): Session {
  const session = createDefaultSession(1, sessionId);
  session.videoState = VideoState.Online;
  Object.assign(session, extra);
  return session;
}

function sessionsOf(...sessions: Session[]): Map<number, Session> {
  const map = new Map<number, Session>();
  for (const session of sessions) {
    map.set(Number(session.sessionId), session);
  }
  return map;
}

describe('createDefaultSession', () => {
  it('should create an offline session with rank 0', () => {
    expect(createDefaultSession(7)).toEqual({
      sessionId: 0,
      modelId: 7,
      videoState: VideoState.Offline,
      rank: 0,
    });
  });
});

describe('isOfflineSession', () => {
  it('should treat offline and missing video states as offline', () => {
    expect(isOfflineSession(createDefaultSession(1))).toBe(true);
    expect(isOfflineSession(onlineSession(1, { videoState: null }))).toBe(true);
    expect(isOfflineSession(onlineSession(1))).toBe(false);
    expect(isOfflineSession(onlineSession(1, { videoState: VideoState.Away }))).toBe(false);
  });
});

describe('selectBestSessionId', () => {
  it('should return 0 when there are no sessions', () => {
    expect(selectBestSessionId(new Map())).toBe(0);
  });

  it('should return 0 when every session is offline', () => {
    const offline = createDefaultSession(1, 12);
    expect(selectBestSessionId(sessionsOf(offline))).toBe(0);
  });

  it('should pick the highest session id among ordinary sessions', () => {
    expect(selectBestSessionId(sessionsOf(onlineSession(10), onlineSession(20)))).toBe(20);
  });

  it('should prefer official software over a higher session id', () => {
    const sessions = sessionsOf(onlineSession(5, { officialSoftware: true }), onlineSession(20));
    expect(selectBestSessionId(sessions)).toBe(5);
  });

  it('should prefer official software regardless of insertion order', () => {
    const sessions = sessionsOf(onlineSession(20), onlineSession(5, { officialSoftware: true }));
    expect(selectBestSessionId(sessions)).toBe(5);
  });

  it('should pick the highest id among official software sessions', () => {
    const sessions = sessionsOf(
      onlineSession(5, { officialSoftware: true }),
      onlineSession(40),
      onlineSession(7, { officialSoftware: true })
    );
    expect(selectBestSessionId(sessions)).toBe(7);
  });

  it('should skip offline sessions even when official', () => {
    const official = onlineSession(50, { officialSoftware: true, videoState: VideoState.Offline });
    expect(selectBestSessionId(sessionsOf(official, onlineSession(10)))).toBe(10);
  });
});

describe('decodeSessionFlags', () => {
  it('should decode each bit', () => {
    expect(decodeSessionFlags(ModelFlag.TruePrivate | ModelFlag.OfficialSoftware)).toEqual({
      truePrivate: true,
      guestsMuted: false,
      basicsMuted: false,
      officialSoftware: true,
    });
    expect(decodeSessionFlags(ModelFlag.GuestsMuted | ModelFlag.BasicsMuted)).toEqual({
      truePrivate: false,
      guestsMuted: true,
      basicsMuted: true,
      officialSoftware: false,
    });
  });

  it('should ignore unrelated bits', () => {
    expect(decodeSessionFlags(1 | 2 | 4)).toEqual({
      truePrivate: false,
      guestsMuted: false,
      basicsMuted: false,
      officialSoftware: false,
    });
  });
});

describe('isTruePrivate', () => {
  it('should require both a private show and the flag', () => {
    expect(isTruePrivate(onlineSession(1, { videoState: VideoState.Private, truePrivate: true }))).toBe(true);
    expect(isTruePrivate(onlineSession(1, { videoState: VideoState.Private }))).toBe(false);
    expect(isTruePrivate(onlineSession(1, { truePrivate: true }))).toBe(false);
  });
});
