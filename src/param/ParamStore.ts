import type { Fqn } from '../types/ids.js';
import type { ParamDescription, ScanTarget, ScanValue } from '../types/target.js';
import { ConfigError } from '../errors.js';

export interface ParamInfo {
  description?: string;
  unit?: string;
  scale?: number;
  step?: number;
  min?: number;
  max?: number;
  isScannable?: boolean;
}

abstract class NumericParamStore implements ScanTarget {
  protected current: ScanValue;

  protected constructor(
    readonly identity: Fqn,
    protected readonly defaultValue: ScanValue,
    protected readonly info: ParamInfo
  ) {
    this.current = defaultValue;
  }

  abstract readonly type: 'float' | 'int';

  abstract coerce(value: number): ScanValue;

  get(): ScanValue {
    return this.current;
  }

  setValue(value: ScanValue): void {
    this.check(value);
    this.current = value;
  }

  describe(): ParamDescription {
    const spec: ParamDescription['spec'] = {
      scale: this.info.scale ?? 1,
      step: this.info.step ?? 0.1,
      isScannable: this.info.isScannable ?? true
    };
    if (this.info.min !== undefined) spec.min = this.info.min;
    if (this.info.max !== undefined) spec.max = this.info.max;
    if (this.info.unit !== undefined) spec.unit = this.info.unit;
    return {
      fqn: this.identity,
      type: this.type,
      description: this.info.description ?? '',
      default: String(this.defaultValue),
      spec
    };
  }

  protected check(value: ScanValue): void {
    if (!Number.isFinite(value)) {
      throw new ConfigError(`Parameter ${this.identity} cannot take ${value}`);
    }
  }
}

export class FloatParamStore extends NumericParamStore {
  readonly type = 'float';

  constructor(identity: Fqn, defaultValue = 0, info: ParamInfo = {}) {
    super(identity, defaultValue, info);
  }

  coerce(value: number): ScanValue {
    return value;
  }
}

/**
 * Integer parameter. Scans over it may come from float ranges; `coerce` truncates
 * towards zero.
 */
export class IntParamStore extends NumericParamStore {
  readonly type = 'int';

  constructor(identity: Fqn, defaultValue = 0, info: ParamInfo = {}) {
    super(identity, defaultValue, { step: 1, ...info });
  }

  coerce(value: number): ScanValue {
    return Math.trunc(value);
  }

  protected check(value: ScanValue): void {
    super.check(value);
    if (!Number.isInteger(value)) {
      throw new ConfigError(`Parameter ${this.identity} only takes integers, got ${value}`);
    }
  }
}
