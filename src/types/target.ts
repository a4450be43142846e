import type { Fqn } from './ids.js';

export type ScanValue = number;

export interface ParamDescription {
  fqn: Fqn;
  type: 'float' | 'int';
  description: string;
  default: string;
  spec: {
    min?: number;
    max?: number;
    unit?: string;
    scale: number;
    step: number;
    isScannable: boolean;
  };
}

export interface ScanTarget {
  readonly identity: Fqn;
  describe(): ParamDescription;
  setValue(value: ScanValue): void;
  coerce(value: number): ScanValue;
}
