import type { AxisIdentity } from '../types/ids.js';
import type { AnnotationContext } from '../types/analysis.js';
import type { ResultChannelLike } from '../types/channel.js';
import { ConfigError } from '../errors.js';
import { axisIdentityKey } from '../spec/scanSpec.js';

export class ScanAnnotationContext implements AnnotationContext {
  private readonly axisIndices: Map<string, number>;

  constructor(
    axisIdentities: readonly AxisIdentity[],
    private readonly shortChannelNames: ReadonlyMap<ResultChannelLike, string>
  ) {
    this.axisIndices = new Map(axisIdentities.map((identity, index) => [axisIdentityKey(identity), index]));
  }

  axisName(identity: AxisIdentity): string {
    const index = this.axisIndices.get(axisIdentityKey(identity));
    if (index === undefined) {
      throw new ConfigError(`Axis ${axisIdentityKey(identity)} is not part of the scan`);
    }
    return `axis_${index}`;
  }

  channelName(channel: ResultChannelLike): string {
    const name = this.shortChannelNames.get(channel);
    if (name === undefined) {
      throw new ConfigError(`Result channel '${channel.path}' has no short name`);
    }
    return `channel_${name}`;
  }
}
