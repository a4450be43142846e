import type { AxisIdentity } from '../types/ids.js';
import type {
  AnalysisDescription,
  Annotation,
  AnnotationContext,
  AnnotationValue,
  DefaultAnalysis
} from '../types/analysis.js';
import type { ResultChannelLike } from '../types/channel.js';
import { ConfigError } from '../errors.js';

export const FIT_PARAMETERS: Readonly<Record<string, readonly string[]>> = {
  lorentzian: ['a', 'fwhm', 'x0', 'y0'],
  gaussian: ['a', 'sigma', 'x0', 'y0'],
  parabola: ['a', 'x0', 'y0'],
  line: ['a', 'b'],
  exponential_decay: ['a', 'tau', 'y_inf']
};

export interface OnlineFitOptions {
  constants?: Record<string, number>;
  initialValues?: Record<string, number>;
}

export function fixedValue(value: number): AnnotationValue {
  return { kind: 'fixed', value };
}

export function onlineResult(analysisName: string, resultKey: string): AnnotationValue {
  return { kind: 'online_result', analysisName, resultKey };
}

/**
 * Describes a fit of one result channel against one axis, to be evaluated by the
 * presentation layer while data comes in. Only the description lives here.
 */
export class OnlineFit implements DefaultAnalysis {
  readonly requiredAxes: readonly AxisIdentity[];
  private readonly parameters: readonly string[];

  constructor(
    readonly fitType: string,
    readonly x: AxisIdentity,
    readonly y: ResultChannelLike,
    private readonly options: OnlineFitOptions = {}
  ) {
    const parameters = FIT_PARAMETERS[fitType];
    if (!parameters) {
      throw new ConfigError(`Unknown fit type '${fitType}'`);
    }
    this.parameters = parameters;
    this.requiredAxes = [x];
  }

  describeOnlineAnalyses(context: AnnotationContext): AnalysisDescription {
    const xName = context.axisName(this.x);
    const yName = context.channelName(this.y);
    const analysisName = `fit_${this.fitType}_${yName}`;

    const curveData: Record<string, AnnotationValue> = {};
    for (const parameter of this.parameters) {
      curveData[parameter] = onlineResult(analysisName, parameter);
    }
    const annotations: Annotation[] = [
      {
        kind: 'computed_curve',
        parameters: { functionName: this.fitType, associatedChannels: [yName] },
        coordinates: {},
        data: curveData
      }
    ];
    if (this.parameters.includes('x0')) {
      annotations.push({
        kind: 'location',
        parameters: { associatedChannels: [yName] },
        coordinates: { [xName]: onlineResult(analysisName, 'x0') },
        data: { [`${xName}_error`]: onlineResult(analysisName, 'x0_error') }
      });
    }

    return {
      annotations,
      onlineAnalyses: {
        [analysisName]: {
          kind: 'named_fit',
          fitType: this.fitType,
          data: { x: xName, y: yName },
          constants: { ...this.options.constants },
          initialValues: { ...this.options.initialValues }
        }
      }
    };
  }
}
