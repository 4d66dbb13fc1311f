import { describe, it, expect } from 'vitest';
import { COMPOSE_DEFAULTS, frameIntervalMs, resolveComposeConfig } from './config.js';
import { ErrorCode } from './errors/index.js';
import { TRANSITION_KINDS } from './types.js';

describe('resolveComposeConfig', () => {
  it('returns the defaults without overrides', () => {
    expect(resolveComposeConfig()).toEqual(COMPOSE_DEFAULTS);
  });

  it('merges section overrides onto the defaults', () => {
    const config = resolveComposeConfig({
      transitions: { overlapMs: 300 },
      avatar: { required: true },
      concurrency: 6,
    });

    expect(config.transitions).toEqual({ kinds: ['crossfade', 'wipe-left', 'slide-up'], overlapMs: 300 });
    expect(config.avatar).toEqual({
      excludeLeading: 1,
      excludeTrailing: 1,
      required: true,
      cropBottomPx: 0,
    });
    expect(config.concurrency).toBe(6);
    expect(config.video).toEqual(COMPOSE_DEFAULTS.video);
  });

  it('rejects a zero-sized pool', () => {
    expect(() => resolveComposeConfig({ concurrency: 0 })).toThrow(
      expect.objectContaining({
        code: ErrorCode.INVALID_CONFIG,
        message: 'Invalid compose configuration: /concurrency must be >= 1',
      })
    );
  });

  it('rejects odd frame dimensions', () => {
    expect(() => resolveComposeConfig({ video: { width: 1081 } })).toThrow(
      expect.objectContaining({ code: ErrorCode.INVALID_CONFIG })
    );
  });

  it('accepts every known transition kind', () => {
    const config = resolveComposeConfig({ transitions: { kinds: [...TRANSITION_KINDS] } });

    expect(config.transitions.kinds).toEqual([...TRANSITION_KINDS]);
  });

  it('rejects an empty transition set', () => {
    expect(() => resolveComposeConfig({ transitions: { kinds: [] } })).toThrow(
      expect.objectContaining({ code: ErrorCode.INVALID_CONFIG })
    );
  });
});

describe('frameIntervalMs', () => {
  it('is one frame at the configured rate', () => {
    expect(frameIntervalMs({ video: { width: 1080, height: 1920, frameRate: 25 } })).toBe(40);
  });
});
