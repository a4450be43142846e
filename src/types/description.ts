import type { Fqn } from './ids.js';
import type { GeneratorLimits } from './generator.js';
import type { ParamDescription } from './target.js';
import type { ChannelDescription } from './channel.js';
import type { Annotation, OnlineAnalysisSpec } from './analysis.js';

export type AxisDescription = {
  param: ParamDescription;
  path: string;
} & GeneratorLimits;

export interface ScanDescription {
  fragmentFqn: Fqn;
  axes: AxisDescription[];
  seed: number;
  numRepeats: number;
  channels: Record<string, ChannelDescription>;
  annotations: Annotation[];
  onlineAnalyses: Record<string, OnlineAnalysisSpec>;
}
