/**
 * Pacing between chunks, so a reply reads like it is being typed
 */

import type { PacingConfig } from './types';

export function pacingDelay(chunkText: string, config: PacingConfig): number {
  if (!config.enabled) return 0;
  return Math.min(config.maxDelayMs, config.baseDelayMs + config.perCharDelayMs * chunkText.length);
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
