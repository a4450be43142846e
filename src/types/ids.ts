export type Instant = string;
export type RunId = string;
export type Fqn = string;

export interface AxisIdentity {
  fqn: Fqn;
  path: string;
}
