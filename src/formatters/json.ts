/**
 * JSON formatter for machine-readable output
 */
import type { SyncResult, VerifyResult } from '../types/index.js';

export function formatJSON(result: SyncResult | VerifyResult): string {
  return JSON.stringify(result, null, 2);
}

/**
 * Single line, for piping
 */
export function formatJSONCompact(result: SyncResult | VerifyResult): string {
  return JSON.stringify(result);
}
