import type { AxisIdentity } from '../types/ids.js';
import type { ResolvedScanSpec, ScanAxis, ScanSpec } from '../types/scan.js';
import { ConfigError } from '../errors.js';
import { resolveSeed, validateSeed } from '../random/seed.js';

export interface ScanSpecInput {
  axes?: readonly ScanAxis[];
  numRepeats?: number;
  continuousWithoutAxes?: boolean;
  randomiseOrderGlobally?: boolean;
  seed?: number | null;
}

export function axisIdentity(axis: ScanAxis): AxisIdentity {
  return { fqn: axis.target.identity, path: axis.path };
}

export function axisIdentityKey(identity: AxisIdentity): string {
  return `${identity.fqn}@${identity.path}`;
}

export function createScanSpec(input: ScanSpecInput): ScanSpec {
  const axes = [...(input.axes ?? [])];
  const numRepeats = input.numRepeats ?? 1;
  if (!Number.isInteger(numRepeats) || numRepeats < 1) {
    throw new ConfigError(`numRepeats must be a positive integer, got ${numRepeats}`);
  }
  const seen = new Set<string>();
  for (const axis of axes) {
    const key = axisIdentityKey(axisIdentity(axis));
    if (seen.has(key)) {
      throw new ConfigError(`Axis ${key} is scanned more than once`);
    }
    seen.add(key);
  }
  const seed = input.seed ?? null;
  if (seed !== null) validateSeed(seed);

  return Object.freeze({
    axes: Object.freeze(axes),
    options: Object.freeze({
      numRepeats,
      randomiseOrderGlobally: input.randomiseOrderGlobally ?? false,
      seed
    }),
    continuousWithoutAxes: input.continuousWithoutAxes ?? false
  });
}

/**
 * Fixes the seed of a spec. A seed already present is kept, so the
 * recorded seed replays the same point order.
 */
export function resolveScanSpec(spec: ScanSpec): ResolvedScanSpec {
  const seed = resolveSeed(spec.options.seed);
  return Object.freeze({
    axes: spec.axes,
    options: Object.freeze({ ...spec.options, seed }),
    continuousWithoutAxes: spec.continuousWithoutAxes
  });
}
