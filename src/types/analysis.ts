import type { AxisIdentity } from './ids.js';
import type { ResultChannelLike } from './channel.js';

export interface FixedValue {
  kind: 'fixed';
  value: number;
}

export interface OnlineResultRef {
  kind: 'online_result';
  analysisName: string;
  resultKey: string;
}

export type AnnotationValue = FixedValue | OnlineResultRef;

export interface Annotation {
  kind: 'computed_curve' | 'location';
  parameters: Record<string, unknown>;
  coordinates: Record<string, AnnotationValue>;
  data: Record<string, AnnotationValue>;
}

export interface NamedFitSpec {
  kind: 'named_fit';
  fitType: string;
  data: Record<string, string>;
  constants: Record<string, number>;
  initialValues: Record<string, number>;
}

export type OnlineAnalysisSpec = NamedFitSpec;

export interface AnnotationContext {
  axisName(identity: AxisIdentity): string;
  channelName(channel: ResultChannelLike): string;
}

export interface AnalysisDescription {
  annotations: Annotation[];
  onlineAnalyses: Record<string, OnlineAnalysisSpec>;
}

export interface DefaultAnalysis {
  readonly requiredAxes: readonly AxisIdentity[];
  describeOnlineAnalyses(context: AnnotationContext): AnalysisDescription;
}
