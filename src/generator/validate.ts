import { ConfigError } from '../errors.js';

export function requireFinite(name: string, value: number): number {
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a finite number, got ${value}`);
  }
  return value;
}

export function requireCount(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

export function requirePositive(name: string, value: number): number {
  requireFinite(name, value);
  if (value <= 0) {
    throw new ConfigError(`${name} must be positive, got ${value}`);
  }
  return value;
}

export function requireLevel(level: number): number {
  if (!Number.isInteger(level) || level < 0) {
    throw new ConfigError(`Refinement level must be a non-negative integer, got ${level}`);
  }
  return level;
}
