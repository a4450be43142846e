import type { Instant } from './ids.js';
import { WarningCode } from './enums.js';

export interface ScanWarning {
  code: WarningCode;
  message: string;
  channel?: string;
  pointIndex: number;
  at: Instant;
}
