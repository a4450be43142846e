import { z } from 'zod';
import type { ScanGenerator } from '../types/generator.js';
import { ErrorCode, GeneratorKind } from '../types/enums.js';
import { ConfigError } from '../errors.js';
import { LinearGenerator } from './LinearGenerator.js';
import { LinearStepGenerator } from './LinearStepGenerator.js';
import { RefiningGenerator } from './RefiningGenerator.js';
import { ListGenerator } from './ListGenerator.js';
import { CentreSpanGenerator } from './CentreSpanGenerator.js';
import { ExpandingGenerator } from './ExpandingGenerator.js';

const randomiseOrder = z.boolean().default(false);

export const LinearRange = z.object({
  start: z.number(),
  stop: z.number(),
  numPoints: z.number().int(),
  randomiseOrder
});

export const LinearStepRange = z.object({
  start: z.number(),
  stop: z.number(),
  step: z.number(),
  randomiseOrder
});

export const RefiningRange = z.object({
  lower: z.number(),
  upper: z.number(),
  randomiseOrder
});

export const ListRange = z.object({
  values: z.array(z.number()),
  randomiseOrder
});

export const CentreSpanRange = z.object({
  centre: z.number(),
  halfSpan: z.number(),
  numPoints: z.number().int(),
  randomiseOrder
});

export const ExpandingRange = z.object({
  centre: z.number(),
  spacing: z.number(),
  randomiseOrder,
  limitLower: z.number().optional(),
  limitUpper: z.number().optional()
});

type GeneratorFactory = (range: unknown) => ScanGenerator;

function parseRange<S extends z.ZodTypeAny>(schema: S, kind: string, range: unknown): z.infer<S> {
  const parsed = schema.safeParse(range);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid range for '${kind}' axis: ${detail}`);
  }
  return parsed.data;
}

const GENERATORS: Record<GeneratorKind, GeneratorFactory> = {
  [GeneratorKind.LINEAR]: (range) => {
    const r = parseRange(LinearRange, GeneratorKind.LINEAR, range);
    return new LinearGenerator(r.start, r.stop, r.numPoints, r.randomiseOrder);
  },
  [GeneratorKind.LINEAR_STEP]: (range) => {
    const r = parseRange(LinearStepRange, GeneratorKind.LINEAR_STEP, range);
    return new LinearStepGenerator(r.start, r.stop, r.step, r.randomiseOrder);
  },
  [GeneratorKind.REFINING]: (range) => {
    const r = parseRange(RefiningRange, GeneratorKind.REFINING, range);
    return new RefiningGenerator(r.lower, r.upper, r.randomiseOrder);
  },
  [GeneratorKind.LIST]: (range) => {
    const r = parseRange(ListRange, GeneratorKind.LIST, range);
    return new ListGenerator(r.values, r.randomiseOrder);
  },
  [GeneratorKind.CENTRE_SPAN]: (range) => {
    const r = parseRange(CentreSpanRange, GeneratorKind.CENTRE_SPAN, range);
    return new CentreSpanGenerator(r.centre, r.halfSpan, r.numPoints, r.randomiseOrder);
  },
  [GeneratorKind.EXPANDING]: (range) => {
    const r = parseRange(ExpandingRange, GeneratorKind.EXPANDING, range);
    return new ExpandingGenerator(r.centre, r.spacing, r.randomiseOrder, {
      lower: r.limitLower,
      upper: r.limitUpper
    });
  }
};

function isGeneratorKind(type: string): type is GeneratorKind {
  return Object.prototype.hasOwnProperty.call(GENERATORS, type);
}

export function createGenerator(type: string, range: unknown): ScanGenerator {
  if (!isGeneratorKind(type)) {
    throw new ConfigError(`Axis type '${type}' not implemented`, ErrorCode.UNKNOWN_GENERATOR);
  }
  return GENERATORS[type](range);
}

export function generatorTypes(): GeneratorKind[] {
  return Object.values(GeneratorKind);
}
