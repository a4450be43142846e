import type { AxisIdentity } from '../types/ids.js';
import type { DefaultAnalysis } from '../types/analysis.js';
import { axisIdentityKey } from '../spec/scanSpec.js';

/**
 * Keeps the analyses whose inputs are all among the scanned axes.
 */
export function filterDefaultAnalyses<A extends DefaultAnalysis>(
  analyses: readonly A[],
  axisIdentities: readonly AxisIdentity[]
): A[] {
  const scanned = new Set(axisIdentities.map(axisIdentityKey));
  return analyses.filter((analysis) =>
    analysis.requiredAxes.every((identity) => scanned.has(axisIdentityKey(identity)))
  );
}
