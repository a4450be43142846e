import type { Fqn } from '../types/ids.js';
import type { DefaultAnalysis } from '../types/analysis.js';
import type { ResultChannelLike } from '../types/channel.js';
import type { ResolvedScanSpec } from '../types/scan.js';
import type { ScanDescription } from '../types/description.js';
import { ErrorCode } from '../types/enums.js';
import { ConfigError } from '../errors.js';
import { axisIdentity } from '../spec/scanSpec.js';
import { filterDefaultAnalyses } from './filterDefaultAnalyses.js';
import { ScanAnnotationContext } from './AnnotationContext.js';

/**
 * Builds the metadata document for a scan: axes with their generator limits, the
 * resolved seed, channel descriptions keyed by short name, and the annotations and
 * online analyses of every default analysis that applies to the scanned axes.
 */
export function describeScan(
  spec: ResolvedScanSpec,
  fragment: { fqn: Fqn },
  shortChannelNames: ReadonlyMap<ResultChannelLike, string>,
  analyses: readonly DefaultAnalysis[] = []
): ScanDescription {
  const identities = spec.axes.map(axisIdentity);
  const channels: ScanDescription['channels'] = {};
  for (const [channel, name] of shortChannelNames) {
    channels[name] = channel.describe();
  }

  const description: ScanDescription = {
    fragmentFqn: fragment.fqn,
    axes: spec.axes.map((axis) => ({
      param: axis.target.describe(),
      path: axis.path,
      ...axis.generator.describeLimits()
    })),
    seed: spec.options.seed,
    numRepeats: spec.options.numRepeats,
    channels,
    annotations: [],
    onlineAnalyses: {}
  };

  const context = new ScanAnnotationContext(identities, shortChannelNames);
  for (const analysis of filterDefaultAnalyses(analyses, identities)) {
    const { annotations, onlineAnalyses } = analysis.describeOnlineAnalyses(context);
    description.annotations.push(...annotations);
    for (const [name, online] of Object.entries(onlineAnalyses)) {
      if (name in description.onlineAnalyses) {
        throw new ConfigError(`An online analysis with name '${name}' already exists`, ErrorCode.DUPLICATE_ANALYSIS);
      }
      description.onlineAnalyses[name] = online;
    }
  }
  return description;
}
