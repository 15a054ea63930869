// Tests for payload validation

import { describe, it, expect } from 'vitest';
import { parseModelPayload, isPropertyGroup } from './payload.js';
import { ModelFlag, VideoState } from '../constants/index.js';

describe('parseModelPayload', () => {
  it('should accept a payload with flat fields and property groups', () => {
    const input = {
      sessionId: 4120,
      level: 4,
      videoState: VideoState.Online,
      name: 'Alice',
      model: { flags: ModelFlag.OfficialSoftware, camscore: 812.5 },
      user: { avatar: 1, blurb: null },
    };

    const result = parseModelPayload(input);

    expect(result.valid).toBe(true);
    if (result.valid) {
      expect(result.payload).toEqual(input);
    }
  });

  it('should accept an empty payload', () => {
    const result = parseModelPayload({});
    expect(result.valid).toBe(true);
  });

  it('should fail for non-object input', () => {
    const result = parseModelPayload(null);

    expect(result.valid).toBe(false);
    expect(result.errors[0].code).toBe('INVALID_TYPE');
    expect(result.errors[0].path).toBe('payload');
  });

  it('should fail for a non-numeric session id', () => {
    const result = parseModelPayload({ sessionId: 'abc' });

    expect(result.valid).toBe(false);
    expect(result.errors[0].path).toBe('sessionId');
    expect(result.errors[0].code).toBe('INVALID_TYPE');
  });

  it('should fail for a negative session id', () => {
    const result = parseModelPayload({ sessionId: -1 });

    expect(result.valid).toBe(false);
    expect(result.errors[0].path).toBe('sessionId');
    expect(result.errors[0].code).toBe('INVALID_VALUE');
  });

  it('should fail for a fractional level', () => {
    const result = parseModelPayload({ level: 4.5 });

    expect(result.valid).toBe(false);
    expect(result.errors[0].path).toBe('level');
  });

  it('should fail for array values', () => {
    const result = parseModelPayload({ topics: ['a', 'b'] });

    expect(result.valid).toBe(false);
    expect(result.errors[0].path).toBe('topics');
  });

  it('should fail for groups nested more than one level', () => {
    const result = parseModelPayload({ model: { inner: { deep: 1 } } });

    expect(result.valid).toBe(false);
    expect(result.errors[0].path.startsWith('model')).toBe(true);
  });
});

describe('isPropertyGroup', () => {
  it('should recognise plain objects as groups', () => {
    expect(isPropertyGroup({ flags: 8 })).toBe(true);
    expect(isPropertyGroup({})).toBe(true);
  });

  it('should reject scalars and missing values', () => {
    expect(isPropertyGroup('name')).toBe(false);
    expect(isPropertyGroup(0)).toBe(false);
    expect(isPropertyGroup(false)).toBe(false);
    expect(isPropertyGroup(null)).toBe(false);
    expect(isPropertyGroup(undefined)).toBe(false);
  });
});
