export interface RandomSource {
  nextUint32(): number;
  nextFloat(): number;
  nextInt(bound: number): number;
}
