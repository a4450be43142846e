export * from './types/enums.js';
export type * from './types/ids.js';
export type * from './types/error.js';
export type * from './types/generator.js';
export type * from './types/random.js';
export type * from './types/target.js';
export type * from './types/sink.js';
export type * from './types/scan.js';
export type * from './types/runner.js';
export type * from './types/analysis.js';
export type * from './types/channel.js';
export type * from './types/description.js';

export * from './errors.js';

export { Mulberry32 } from './random/Mulberry32.js';
export { shuffleInPlace } from './random/shuffle.js';
export { MAX_SEED, resolveSeed, validateSeed } from './random/seed.js';

export { LinearGenerator } from './generator/LinearGenerator.js';
export { LinearStepGenerator } from './generator/LinearStepGenerator.js';
export { RefiningGenerator } from './generator/RefiningGenerator.js';
export { ListGenerator } from './generator/ListGenerator.js';
export { CentreSpanGenerator } from './generator/CentreSpanGenerator.js';
export { ExpandingGenerator, type ExpandingLimits } from './generator/ExpandingGenerator.js';
export { createGenerator, generatorTypes } from './generator/registry.js';

export { continuousPoints, generatePoints, type PointOptions } from './points/generatePoints.js';
export { axisIdentity, axisIdentityKey, createScanSpec, resolveScanSpec, type ScanSpecInput } from './spec/scanSpec.js';
export { applyOverrides, buildScanSpec, parseScanParams, ScanParams, type TScanParams } from './spec/schema.js';

export { FloatChannel, IntChannel, ResultChannel, type ResultChannelOptions } from './result/ResultChannel.js';
export { ArraySink, CallbackSink, LastValueSink } from './result/sinks.js';

export {
  DEFAULT_CHUNK_SIZE,
  DEFAULT_MAX_REMOTE_AXES,
  DEFAULT_PAUSE_CHECK_INTERVAL_S,
  ScanRunner,
  type ScanRunnerOptions
} from './runner/ScanRunner.js';
export type { ChannelBinding, ScanSinks } from './runner/RunRecorder.js';

export { describeScan } from './analysis/describeScan.js';
export { filterDefaultAnalyses } from './analysis/filterDefaultAnalyses.js';
export { FIT_PARAMETERS, fixedValue, OnlineFit, onlineResult, type OnlineFitOptions } from './analysis/OnlineFit.js';

export { FloatParamStore, IntParamStore, type ParamInfo } from './param/ParamStore.js';

export type { DatasetEntry, DatasetStore, SetOptions } from './store/DatasetStore.js';
export { DatasetAppendSink, DatasetBroadcastSink } from './store/datasetSinks.js';
export { MemoryDatasetStore } from './store/memory/MemoryDatasetStore.js';
export { SqliteDatasetStore } from './store/sqlite/SqliteDatasetStore.js';

export {
  DATASET_PREFIX,
  ScanExperiment,
  shortChannelNames,
  type ExperimentFragment,
  type ScanExperimentOptions
} from './experiment/ScanExperiment.js';
export { runSubscan, type SubscanAxis, type SubscanOptions, type SubscanResult } from './subscan/runSubscan.js';

export { shortenToUnambiguousSuffixes } from './utils/suffixes.js';
