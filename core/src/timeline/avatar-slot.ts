import type { AvatarConfig } from '../config.js';
import { randomInt, type RandomSource } from '../random.js';

export interface AvatarEligibility {
  /** First eligible scene index */
  first: number;
  /** Last eligible scene index */
  last: number;
}

/**
 * Range of scene indices that may carry the avatar. With the default
 * exclusions this is the open interval (0, N-1): never the hook, never the
 * outro. Returns null when no scene qualifies.
 */
export function resolveAvatarEligibility(
  sceneCount: number,
  config: Pick<AvatarConfig, 'excludeLeading' | 'excludeTrailing'>
): AvatarEligibility | null {
  const first = config.excludeLeading;
  const last = sceneCount - 1 - config.excludeTrailing;
  if (last < first) {
    return null;
  }
  return { first, last };
}

/**
 * Draws the avatar scene for this run. Recomputed on every run and never
 * persisted; reproducible only through the injected random source.
 */
export function selectAvatarSlot(
  sceneCount: number,
  random: RandomSource,
  config: Pick<AvatarConfig, 'excludeLeading' | 'excludeTrailing'>
): number | null {
  const eligibility = resolveAvatarEligibility(sceneCount, config);
  if (!eligibility) {
    return null;
  }
  return randomInt(random, eligibility.first, eligibility.last);
}
