import type { Instant } from '../types/ids.js';

export function nowInstant(): Instant {
  return new Date().toISOString();
}
